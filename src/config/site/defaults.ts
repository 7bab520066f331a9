/**
 * Default site configuration.
 *
 * Projects override individual fields through a JSON file (see
 * loadSiteConfigFile) and the SITE_BASE_URL / PAGE_SIZE environment
 * variables.
 */

import type { SiteConfig } from "./schema.js";

export const DEFAULT_SITE_CONFIG: SiteConfig = {
  name: "Tech Blog",
  description:
    "A technical blog about systems, security and software, with practical guides.",
  author: "Site Author",
  eyebrow: "Firmware - Cybersecurity - Embedded Systems",
  heroTitle: "Technology. Code. Systems.",
  heroSubtitle: "Practical articles on infrastructure, security and automation.",
  heroPanel: [
    "New: PCB reliability checklist",
    "Hardening for local servers",
    "Zero downtime updates in the lab",
  ],
  copyright: "Tech Blog",
  defaultImage: "assets/images/chip.svg",
  baseUrl: "https://example.com",
  pageSize: 8,

  about: {
    title: "About",
    subtitle: "A technical blog focused on systems, security and automation.",
    image: "assets/images/author-placeholder.svg",
    paragraphs: [
      "This blog collects practical guides, checklists and procedures taken from day-to-day work with Linux servers, shared storage and automation.",
      "No marketing, only things that proved useful.",
      "Topic suggestions are welcome through the project's issue tracker.",
    ],
  },

  copy: {
    articlesTitle: "Articles",
    articlesSubtitle: "Every published article, newest first.",
    articlesDescription: "Archive of technical articles with practical guides and checklists.",
    categoriesTitle: "Categories",
    categoriesDescription: "All tags, updated on every build.",
    aboutDescription: "Who writes this blog and how the articles are made.",
  },
};
