export * from "./types/match";
export * from "./types/events";
export * from "./types/protocol";
export * from "./libs/Encoding";
export * from "./libs/Crypto";
export { formatAddress } from "./libs/formatAddress";
export { formatRelativeTime } from "./libs/relativeTime";

// Database layer
export * from "./database";

// Validation
export {
  isEvmAddress,
  normalizeAddress,
  buildAuthMessage,
  requestDigest,
  signedParams,
  AUTH_FIELDS,
  verifySignature,
  validateAuth,
  AUTH_MESSAGE_MAX_AGE_MS,
} from "./validation";
