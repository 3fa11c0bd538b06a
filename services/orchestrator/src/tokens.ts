export const APP_CONFIG = Symbol("APP_CONFIG");
export const PROMPT_TABLE = Symbol("PROMPT_TABLE");
export const VISION_CLIENTS = Symbol("VISION_CLIENTS");
export const DECISION_REPOSITORY = Symbol("DECISION_REPOSITORY");
export const IMAGE_LOADER = Symbol("IMAGE_LOADER");
