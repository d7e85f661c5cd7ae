export const APP_NAME = "parley"
export const APP_VERSION = "0.1.0"
