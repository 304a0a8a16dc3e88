// ============================================
// MCPML Shared Types
// ============================================

export type { ErrResult, OkResult, Result } from "./types/result.js";
export {
  Err,
  isErr,
  isOk,
  map,
  mapErr,
  Ok,
  tryCatchAsync,
  unwrap,
  unwrapOr,
} from "./types/result.js";
export { isRecord } from "./utils/guards.js";
