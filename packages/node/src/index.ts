/**
 * @wtoken/node — HTTP devnet for the wrapped rebasing token.
 */

export { WrapperService } from "./services/wrapper-service.js";
export type {
  AccountInfo,
  TokenInfo,
  WrapperServiceConfig,
} from "./services/wrapper-service.js";
export { loadConfig, ConfigSchema, serviceConfigFrom } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
