/**
 * Page planning module: routes, pagination, typed page contexts and the
 * planner that enumerates every output page.
 */

export * from "./contexts.js";
export * from "./routes.js";
export { totalPages, paginate, type PageSlice } from "./pagination.js";
export {
  websiteJsonLd,
  collectionPageJsonLd,
  aboutPageJsonLd,
  blogPostingJsonLd,
  breadcrumbListJsonLd,
  serializeJsonLd,
  type JsonLd,
  type Breadcrumb,
} from "./structured-data.js";
export {
  planSite,
  countPagesByKind,
  sitemapEntries,
  HOME_LATEST_COUNT,
  HOME_TRENDING_COUNT,
  type PageKind,
  type PagePlanEntry,
  type HomePage,
  type ListingPage,
  type TaxonomyPage,
  type InfoPage,
  type TagPage,
  type DetailPage,
  type SitemapEntry,
  type SitePlan,
  type PlanSiteInput,
} from "./planner.js";
