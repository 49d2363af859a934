/**
 * Version information for remindkit
 *
 * Keep in sync with package.json
 */

export const VERSION = '0.1.0';
export const PACKAGE_NAME = 'remindkit';
