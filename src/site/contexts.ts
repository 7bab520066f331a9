/**
 * Typed page contexts.
 *
 * One context shape per page kind. Absent values are null, never
 * undefined, so every template path resolves. The renderer converts these
 * objects with toTemplateData() just before rendering.
 */

export type NavSection = "home" | "articles" | "categories" | "about";

/** Site-wide copy shown on every page. */
export interface SiteView {
  name: string;
  description: string;
  author: string;
  eyebrow: string;
  heroTitle: string;
  heroSubtitle: string;
  copyright: string;
}

/** Navigation targets resolved for the page's depth. */
export interface NavLinks {
  home: string;
  articles: string;
  categories: string;
  about: string;
  /** Contact anchor on the home page */
  contact: string;
}

export interface PageMeta {
  title: string;
  description: string;
  /** Absolute canonical URL */
  canonical: string;
  ogType: "website" | "article";
  /** Absolute social preview image URL */
  image: string;
  /** Serialized JSON-LD payload, safe inside a script element */
  jsonLd: string;
}

export interface BaseContext {
  site: SiteView;
  /** Relative path to the assets directory */
  assetBase: string;
  navLinks: NavLinks;
  navActive: NavSection;
  meta: PageMeta;
}

export interface TagLinkView {
  slug: string;
  label: string;
  url: string;
}

export interface TagCountView {
  slug: string;
  label: string;
  count: number;
  url: string;
}

/** A document as shown in cards and lists. */
export interface PostView {
  slug: string;
  title: string;
  excerpt: string;
  /** YYYY-MM-DD */
  date: string;
  author: string;
  readTime: number;
  imageUrl: string;
  imageAlt: string;
  url: string;
  tags: TagLinkView[];
}

export interface PostDetailView extends PostView {
  /** Rendered body, inserted without escaping */
  contentHtml: string;
}

export interface PaginationView {
  current: number;
  total: number;
  /** True when there is more than one page */
  multiple: boolean;
  /** Absent on the first page */
  prevUrl: string | null;
  /** Absent on the last page */
  nextUrl: string | null;
}

export interface HomeContext extends BaseContext {
  latestPosts: PostView[];
  trendingPosts: PostView[];
  tags: TagCountView[];
  heroPanel: string[];
}

export interface ListingContext extends BaseContext {
  pageTitle: string;
  pageSubtitle: string;
  posts: PostView[];
  pagination: PaginationView;
}

export interface TaxonomyContext extends BaseContext {
  pageTitle: string;
  tags: TagCountView[];
}

export interface TagContext extends BaseContext {
  tag: { slug: string; label: string; count: number };
  posts: PostView[];
}

export interface DetailContext extends BaseContext {
  post: PostDetailView;
}

export interface InfoContext extends BaseContext {
  about: {
    title: string;
    subtitle: string;
    image: string;
    paragraphs: string[];
  };
}
