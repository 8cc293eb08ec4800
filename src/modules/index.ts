/**
 * Pipeline modules export
 */

export { ensureSubdirectory } from "./layout";
export { verify } from "./verifier";
export {
  buildConversionArgs,
  convertVector,
  toBinary,
  toText,
} from "./converter";
export { buildOrderingArgs, order } from "./ordering";
export { run } from "./pipeline";
export { read, readTextOrdering, parseTextOrdering } from "./reader";
export { writeTextVector, serializeNetwork } from "./serializer";
export { clean } from "./cleanup";
export { stats, formatDuration } from "./stats";
