/**
 * schema.org JSON-LD payloads for each page kind.
 */

import type { Document } from "../content/schema.js";

const SCHEMA_CONTEXT = "https://schema.org";

export type JsonLd = Record<string, unknown>;

export function websiteJsonLd(name: string, url: string, description: string): JsonLd {
  return {
    "@context": SCHEMA_CONTEXT,
    "@type": "WebSite",
    name,
    url,
    description,
  };
}

export function collectionPageJsonLd(name: string, url: string): JsonLd {
  return {
    "@context": SCHEMA_CONTEXT,
    "@type": "CollectionPage",
    name,
    url,
  };
}

export function aboutPageJsonLd(name: string, url: string): JsonLd {
  return {
    "@context": SCHEMA_CONTEXT,
    "@type": "AboutPage",
    name,
    url,
  };
}

export function blogPostingJsonLd(
  document: Document,
  pageUrl: string,
  imageUrl: string
): JsonLd {
  return {
    "@context": SCHEMA_CONTEXT,
    "@type": "BlogPosting",
    headline: document.title,
    datePublished: document.dateString,
    dateModified: document.dateString,
    author: { "@type": "Person", name: document.author },
    image: imageUrl,
    keywords: [...document.tags],
    mainEntityOfPage: pageUrl,
  };
}

export interface Breadcrumb {
  name: string;
  url: string;
}

export function breadcrumbListJsonLd(crumbs: readonly Breadcrumb[]): JsonLd {
  return {
    "@context": SCHEMA_CONTEXT,
    "@type": "BreadcrumbList",
    itemListElement: crumbs.map((crumb, index) => ({
      "@type": "ListItem",
      position: index + 1,
      name: crumb.name,
      item: crumb.url,
    })),
  };
}

/**
 * Serialize for embedding in `<script type="application/ld+json">`.
 * Every `<` is written as the \u003c escape so a value cannot close
 * the element.
 */
export function serializeJsonLd(payload: JsonLd | readonly JsonLd[]): string {
  return JSON.stringify(payload).replace(/</g, "\\u003c");
}
