/**
 * Package version - should match package.json
 */
export const VERSION = '0.1.0';
