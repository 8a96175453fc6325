export { createApp, type AppDependencies } from "./web/app.js";
export { loadConfig, type AppConfig, type GarminDomain } from "./lib/config.js";
export {
  AuthenticationError,
  ConfigurationError,
  RateLimitError,
  RemoteServiceError,
  ValidationError,
  httpStatusFor,
  userMessageFor,
} from "./lib/errors.js";
export { setLogLevel, setupLogger, type LogLevel, type Logger } from "./lib/logger.js";
export { GarminConnectClient } from "./services/garmin-connect/api-client.js";
export { encodeBodyComposition } from "./services/garmin-connect/fit-encoder.js";
export type {
  BodyComposition,
  BodyCompositionApi,
  GarminCredentials,
  GarminTokens,
} from "./services/garmin-connect/types.js";
export { SessionManager, type Session, type SessionSource } from "./session/session-manager.js";
export { FileTokenStore, MemoryTokenStore, type TokenStore } from "./session/token-store.js";
export { parseMeasurement, type Measurement } from "./submission/measurement.js";
export { submitMeasurement, type SubmissionResult } from "./submission/submit.js";
