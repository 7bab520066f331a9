export {
  buildSite,
  BuildError,
  type BuildOptions,
  type BuildPhase,
  type BuildReport,
} from "./builder.js";
