import { URI } from "vscode-uri";
import path from "node:path";

export {
  debug,
  configureDebug,
  formatDebugMessage,
  getDebugChannel,
  isDebugEnabled,
  refreshDebugChannels,
  type Debug,
  type DebugChannel,
  type DebugConfig,
  type DebugData,
} from "./debug.js";
export { createPrefixedLogger, NOOP_LOGGER, type Logger } from "./logger.js";

/**
 * Base name of the virtual shim document. The tool echoes it back as a
 * `nul:<line>:<col>:` prefix on notes that point into the shim.
 */
export const SHIM_VIRTUAL_FILE = "nul";

/**
 * The shim document sits beside its host file so the tool picks up the same
 * project configuration (compile flags, include paths).
 */
export function shimDocumentUri(hostFsPath: string, virtualFile: string = SHIM_VIRTUAL_FILE): string {
  const dir = path.dirname(path.resolve(hostFsPath));
  return URI.file(path.join(dir, virtualFile)).toString();
}
