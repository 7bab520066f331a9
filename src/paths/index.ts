/**
 * Path resolution module.
 */

export {
  pageDepth,
  relativeRoot,
  resolveFromRoot,
  createPathResolver,
  type PathResolver,
} from "./resolver.js";
