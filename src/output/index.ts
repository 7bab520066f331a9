/**
 * Output writing helpers.
 */

export {
  writeOutputFile,
  ensureOutputDirs,
  copyStaticDir,
  outputFilePath,
  OutputWriteError,
} from "./files.js";
