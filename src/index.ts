export { buildReplayConfig } from "./config/loadConfig.js";
export type { CliOptions, ReplayConfig } from "./config/types.js";
export * from "./replay/index.js";
export { SearchResponseAccumulator } from "./sink/searchAccumulator.js";
export type { SearchSummary } from "./sink/searchAccumulator.js";
export type { ResponseSink } from "./sink/types.js";
export * from "./source/index.js";
export { HttpTransport } from "./transport/httpTransport.js";
export { TRANSPORT_ERROR_STATUS } from "./transport/types.js";
export type { ReplayResponse, Transport } from "./transport/types.js";
export type { Clock } from "./util/clock.js";
export * from "./util/errors.js";
