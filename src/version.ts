export const APP_NAME = "idea-factory";
export const APP_VERSION = "0.1.0";
