/**
 * Page planner.
 *
 * Turns the loaded documents, the tag index and the site configuration
 * into the complete list of pages to render. Planning is pure: it reads
 * no files and writes none, and every page's links are resolved here
 * from the page's own output path.
 *
 * Plan order (also sitemap order):
 *   home → listing pages 1..N → taxonomy index → about →
 *   tag pages (ranked) → detail pages (canonical document order)
 */

import type { SiteConfig } from "../config/site/schema.js";
import type { Document } from "../content/schema.js";
import { formatDate } from "../content/normalize.js";
import type { TagIndex } from "../taxonomy/aggregator.js";
import { createPathResolver, type PathResolver } from "../paths/resolver.js";
import type {
  BaseContext,
  DetailContext,
  HomeContext,
  InfoContext,
  ListingContext,
  NavSection,
  PageMeta,
  TagContext,
  TaxonomyContext,
} from "./contexts.js";
import {
  ABOUT_PATH,
  ASSETS_DIR,
  CATEGORIES_PATH,
  HOME_PATH,
  absoluteUrl,
  articlePath,
  canonicalPath,
  listingPath,
  tagPath,
} from "./routes.js";
import { paginate } from "./pagination.js";
import {
  aboutPageJsonLd,
  blogPostingJsonLd,
  breadcrumbListJsonLd,
  collectionPageJsonLd,
  websiteJsonLd,
} from "./structured-data.js";
import {
  absoluteResourceUrl,
  navLinks,
  pageMeta,
  postDetailView,
  postView,
  resourceUrl,
  siteView,
  tagCount,
} from "./views.js";

/** Documents shown in the home page "latest" strip. */
export const HOME_LATEST_COUNT = 3;

/** Documents shown in the home page "trending" list. */
export const HOME_TRENDING_COUNT = 5;

// ---------------------------------------------------------------------------
// Plan types
// ---------------------------------------------------------------------------

export type PageKind = "home" | "listing" | "taxonomy" | "info" | "tag" | "detail";

interface PlannedPage<K extends PageKind, C extends BaseContext> {
  kind: K;
  /** Template filename */
  template: string;
  /** Site-root-relative output file */
  outputPath: string;
  /** Directories between the site root and the output file */
  depth: number;
  /** Absolute canonical URL */
  url: string;
  /** YYYY-MM-DD */
  lastModified: string;
  context: C;
}

export type HomePage = PlannedPage<"home", HomeContext>;
export type ListingPage = PlannedPage<"listing", ListingContext>;
export type TaxonomyPage = PlannedPage<"taxonomy", TaxonomyContext>;
export type InfoPage = PlannedPage<"info", InfoContext>;
export type TagPage = PlannedPage<"tag", TagContext>;
export type DetailPage = PlannedPage<"detail", DetailContext>;

export type PagePlanEntry =
  | HomePage
  | ListingPage
  | TaxonomyPage
  | InfoPage
  | TagPage
  | DetailPage;

export interface SitemapEntry {
  /** Absolute URL */
  loc: string;
  /** YYYY-MM-DD */
  lastmod: string;
}

export interface SitePlan {
  pages: PagePlanEntry[];
  /** One entry per distinct page URL, in plan order */
  sitemap: SitemapEntry[];
  /** Date stamped on pages not backed by a single document */
  buildDate: string;
}

export interface PlanSiteInput {
  documents: readonly Document[];
  tags: TagIndex;
  site: SiteConfig;
  /** Build time; its UTC date becomes lastModified of non-document pages */
  buildDate: Date;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface PageFrame {
  outputPath: string;
  paths: PathResolver;
  canonical: string;
  url: string;
}

function frameFor(outputPath: string, baseUrl: string): PageFrame {
  const canonical = canonicalPath(outputPath);
  return {
    outputPath,
    paths: createPathResolver(outputPath),
    canonical,
    url: absoluteUrl(baseUrl, canonical),
  };
}

function baseContext(
  site: SiteConfig,
  frame: PageFrame,
  navActive: NavSection,
  meta: PageMeta
): BaseContext {
  return {
    site: siteView(site),
    assetBase: frame.paths.to(ASSETS_DIR),
    navLinks: navLinks(frame.paths),
    navActive,
    meta,
  };
}

// ---------------------------------------------------------------------------
// Page builders
// ---------------------------------------------------------------------------

function planHome(input: PlanSiteInput, buildDate: string): HomePage {
  const { site, documents, tags } = input;
  const frame = frameFor(HOME_PATH, site.baseUrl);
  const meta = pageMeta(site.baseUrl, {
    title: `${site.name} | Home`,
    description: site.description,
    canonicalPath: frame.canonical,
    ogType: "website",
    image: site.defaultImage,
    jsonLd: websiteJsonLd(site.name, frame.url, site.description),
  });

  return {
    kind: "home",
    template: "index.html",
    outputPath: frame.outputPath,
    depth: frame.paths.depth,
    url: frame.url,
    lastModified: buildDate,
    context: {
      ...baseContext(site, frame, "home", meta),
      latestPosts: documents.slice(0, HOME_LATEST_COUNT).map((d) => postView(d, frame.paths)),
      trendingPosts: documents.slice(0, HOME_TRENDING_COUNT).map((d) => postView(d, frame.paths)),
      tags: tags.ranked.map((tag) => tagCount(tag, frame.paths)),
      heroPanel: [...site.heroPanel],
    },
  };
}

function planListings(input: PlanSiteInput, buildDate: string): ListingPage[] {
  const { site, documents } = input;

  return paginate(documents, site.pageSize).map((slice) => {
    const frame = frameFor(listingPath(slice.page), site.baseUrl);
    const meta = pageMeta(site.baseUrl, {
      title: `${site.copy.articlesTitle} | Page ${slice.page}`,
      description: site.copy.articlesDescription,
      canonicalPath: frame.canonical,
      ogType: "website",
      image: site.defaultImage,
      jsonLd: collectionPageJsonLd(site.copy.articlesTitle, frame.url),
    });

    return {
      kind: "listing" as const,
      template: "articles.html",
      outputPath: frame.outputPath,
      depth: frame.paths.depth,
      url: frame.url,
      lastModified: buildDate,
      context: {
        ...baseContext(site, frame, "articles", meta),
        pageTitle: site.copy.articlesTitle,
        pageSubtitle: site.copy.articlesSubtitle,
        posts: slice.items.map((d) => postView(d, frame.paths)),
        pagination: {
          current: slice.page,
          total: slice.totalPages,
          multiple: slice.totalPages > 1,
          prevUrl: slice.page > 1 ? frame.paths.to(listingPath(slice.page - 1)) : null,
          nextUrl:
            slice.page < slice.totalPages ? frame.paths.to(listingPath(slice.page + 1)) : null,
        },
      },
    };
  });
}

function planTaxonomy(input: PlanSiteInput, buildDate: string): TaxonomyPage {
  const { site, tags } = input;
  const frame = frameFor(CATEGORIES_PATH, site.baseUrl);
  const meta = pageMeta(site.baseUrl, {
    title: site.copy.categoriesTitle,
    description: site.copy.categoriesDescription,
    canonicalPath: frame.canonical,
    ogType: "website",
    image: site.defaultImage,
    jsonLd: collectionPageJsonLd(site.copy.categoriesTitle, frame.url),
  });

  return {
    kind: "taxonomy",
    template: "categories.html",
    outputPath: frame.outputPath,
    depth: frame.paths.depth,
    url: frame.url,
    lastModified: buildDate,
    context: {
      ...baseContext(site, frame, "categories", meta),
      pageTitle: site.copy.categoriesTitle,
      tags: tags.ranked.map((tag) => tagCount(tag, frame.paths)),
    },
  };
}

function planInfo(input: PlanSiteInput, buildDate: string): InfoPage {
  const { site } = input;
  const frame = frameFor(ABOUT_PATH, site.baseUrl);
  const meta = pageMeta(site.baseUrl, {
    title: `${site.about.title} | ${site.name}`,
    description: site.copy.aboutDescription,
    canonicalPath: frame.canonical,
    ogType: "website",
    image: site.defaultImage,
    jsonLd: aboutPageJsonLd(site.about.title, frame.url),
  });

  return {
    kind: "info",
    template: "about.html",
    outputPath: frame.outputPath,
    depth: frame.paths.depth,
    url: frame.url,
    lastModified: buildDate,
    context: {
      ...baseContext(site, frame, "about", meta),
      about: {
        title: site.about.title,
        subtitle: site.about.subtitle,
        image: resourceUrl(site.about.image, frame.paths),
        paragraphs: [...site.about.paragraphs],
      },
    },
  };
}

function planTags(input: PlanSiteInput, buildDate: string): TagPage[] {
  const { site, tags } = input;

  return tags.ranked.map((summary) => {
    const bucket = tags.buckets.get(summary.slug);
    const members = bucket ? bucket.documents : [];
    const frame = frameFor(tagPath(summary.slug), site.baseUrl);
    const meta = pageMeta(site.baseUrl, {
      title: `Tag: ${summary.label}`,
      description: `Articles tagged ${summary.label}.`,
      canonicalPath: frame.canonical,
      ogType: "website",
      image: site.defaultImage,
      jsonLd: collectionPageJsonLd(`Tag: ${summary.label}`, frame.url),
    });

    return {
      kind: "tag" as const,
      template: "tag.html",
      outputPath: frame.outputPath,
      depth: frame.paths.depth,
      url: frame.url,
      lastModified: buildDate,
      context: {
        ...baseContext(site, frame, "categories", meta),
        tag: { slug: summary.slug, label: summary.label, count: summary.count },
        posts: members.map((d) => postView(d, frame.paths)),
      },
    };
  });
}

function planDetails(input: PlanSiteInput): DetailPage[] {
  const { site, documents } = input;
  const homeUrl = absoluteUrl(site.baseUrl, canonicalPath(HOME_PATH));
  const articlesUrl = absoluteUrl(site.baseUrl, canonicalPath(listingPath(1)));

  return documents.map((document) => {
    const frame = frameFor(articlePath(document.slug), site.baseUrl);
    const imageUrl = absoluteResourceUrl(site.baseUrl, document.coverImage);
    const meta = pageMeta(site.baseUrl, {
      title: document.title,
      description: document.excerpt,
      canonicalPath: frame.canonical,
      ogType: "article",
      image: document.coverImage,
      jsonLd: [
        blogPostingJsonLd(document, frame.url, imageUrl),
        breadcrumbListJsonLd([
          { name: "Home", url: homeUrl },
          { name: site.copy.articlesTitle, url: articlesUrl },
          { name: document.title, url: frame.url },
        ]),
      ],
    });

    return {
      kind: "detail" as const,
      template: "article.html",
      outputPath: frame.outputPath,
      depth: frame.paths.depth,
      url: frame.url,
      lastModified: document.dateString,
      context: {
        ...baseContext(site, frame, "articles", meta),
        post: postDetailView(document, frame.paths),
      },
    };
  });
}

// ---------------------------------------------------------------------------
// Planner
// ---------------------------------------------------------------------------

/**
 * Plan every page of the site and its sitemap entries.
 */
export function planSite(input: PlanSiteInput): SitePlan {
  const buildDate = formatDate(input.buildDate);

  const pages: PagePlanEntry[] = [
    planHome(input, buildDate),
    ...planListings(input, buildDate),
    planTaxonomy(input, buildDate),
    planInfo(input, buildDate),
    ...planTags(input, buildDate),
    ...planDetails(input),
  ];

  return {
    pages,
    sitemap: sitemapEntries(pages),
    buildDate,
  };
}

/**
 * One sitemap entry per URL, in plan order. Detail pages of colliding
 * identifiers share a URL; the last one planned is the file left on disk,
 * so its date is the one listed.
 */
export function sitemapEntries(pages: readonly PagePlanEntry[]): SitemapEntry[] {
  const byLoc = new Map<string, SitemapEntry>();
  for (const page of pages) {
    byLoc.set(page.url, { loc: page.url, lastmod: page.lastModified });
  }
  return [...byLoc.values()];
}

/**
 * Count planned pages per kind.
 */
export function countPagesByKind(pages: readonly PagePlanEntry[]): Record<PageKind, number> {
  const counts: Record<PageKind, number> = {
    home: 0,
    listing: 0,
    taxonomy: 0,
    info: 0,
    tag: 0,
    detail: 0,
  };
  for (const page of pages) {
    counts[page.kind] += 1;
  }
  return counts;
}
