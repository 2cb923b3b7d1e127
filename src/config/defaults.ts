export const DEFAULT_PORT = 9200;
export const DEFAULT_SPEED_MULTIPLIER = 1;
export const DEFAULT_LOG_LEVEL = "info";
