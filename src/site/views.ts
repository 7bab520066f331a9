/**
 * View builders shared by the page planner: document cards, tag links,
 * navigation and SEO metadata, each resolved for one page's location.
 */

import type { SiteConfig } from "../config/site/schema.js";
import type { Document } from "../content/schema.js";
import { labelFromSlug } from "../content/slug.js";
import type { TagSummary } from "../taxonomy/aggregator.js";
import type { PathResolver } from "../paths/resolver.js";
import type {
  NavLinks,
  PageMeta,
  PostDetailView,
  PostView,
  SiteView,
  TagCountView,
  TagLinkView,
} from "./contexts.js";
import { ABOUT_PATH, CATEGORIES_PATH, HOME_PATH, absoluteUrl, articlePath, listingPath, tagPath } from "./routes.js";
import { serializeJsonLd, type JsonLd } from "./structured-data.js";

const EXTERNAL_URL_RE = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Link to an image or other resource: site-root-relative paths are
 * resolved for the page, absolute URLs are kept.
 */
export function resourceUrl(target: string, paths: PathResolver): string {
  return EXTERNAL_URL_RE.test(target) ? target : paths.to(target);
}

/**
 * Absolute URL of a resource for metadata consumed off-site.
 */
export function absoluteResourceUrl(baseUrl: string, target: string): string {
  if (target === "") return "";
  return EXTERNAL_URL_RE.test(target) ? target : absoluteUrl(baseUrl, target);
}

export function siteView(site: SiteConfig): SiteView {
  return {
    name: site.name,
    description: site.description,
    author: site.author,
    eyebrow: site.eyebrow,
    heroTitle: site.heroTitle,
    heroSubtitle: site.heroSubtitle,
    copyright: site.copyright,
  };
}

export function navLinks(paths: PathResolver): NavLinks {
  const home = paths.to(HOME_PATH);
  return {
    home,
    articles: paths.to(listingPath(1)),
    categories: paths.to(CATEGORIES_PATH),
    about: paths.to(ABOUT_PATH),
    contact: `${home}#contact`,
  };
}

export function tagLink(slug: string, paths: PathResolver): TagLinkView {
  return { slug, label: labelFromSlug(slug), url: paths.to(tagPath(slug)) };
}

export function tagCount(tag: TagSummary, paths: PathResolver): TagCountView {
  return {
    slug: tag.slug,
    label: tag.label,
    count: tag.count,
    url: paths.to(tagPath(tag.slug)),
  };
}

export function postView(document: Document, paths: PathResolver): PostView {
  return {
    slug: document.slug,
    title: document.title,
    excerpt: document.excerpt,
    date: document.dateString,
    author: document.author,
    readTime: document.readTime,
    imageUrl: resourceUrl(document.coverImage, paths),
    imageAlt: document.title,
    url: paths.to(articlePath(document.slug)),
    tags: document.tags.map((slug) => tagLink(slug, paths)),
  };
}

export function postDetailView(document: Document, paths: PathResolver): PostDetailView {
  return { ...postView(document, paths), contentHtml: document.contentHtml };
}

export interface MetaInput {
  title: string;
  description: string;
  canonicalPath: string;
  ogType: PageMeta["ogType"];
  /** Site-root-relative image path */
  image: string;
  jsonLd: JsonLd | readonly JsonLd[];
}

export function pageMeta(baseUrl: string, input: MetaInput): PageMeta {
  return {
    title: input.title,
    description: input.description,
    canonical: absoluteUrl(baseUrl, input.canonicalPath),
    ogType: input.ogType,
    image: absoluteResourceUrl(baseUrl, input.image),
    jsonLd: serializeJsonLd(input.jsonLd),
  };
}
