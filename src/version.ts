export const APP_NAME = 'keygate';
export const APP_VERSION = '1.0.0';
