/**
 * Taxonomy module: tag buckets and ranking.
 */

export {
  aggregateTags,
  compareTagRank,
  type TagBucket,
  type TagSummary,
  type TagIndex,
} from "./aggregator.js";
