/**
 * Site configuration schema definition.
 *
 * The site configuration is read once at startup, validated, frozen, and
 * then handed to every build component explicitly. Nothing in the pipeline
 * reads site-wide values from ambient state.
 */

import { z } from "zod";

/**
 * Copy for the informational "about" page.
 */
export const AboutPageSchema = z
  .object({
    /** Page heading */
    title: z.string().min(1).describe("Heading of the about page"),

    /** Sub-heading under the title */
    subtitle: z.string().describe("Short line under the about heading"),

    /** Site-root-relative path of the portrait or illustration */
    image: z.string().min(1).describe("Site-root-relative image path"),

    /** Body paragraphs, rendered in order */
    paragraphs: z
      .array(z.string().min(1))
      .describe("Plain-text paragraphs of the about page"),
  })
  .strict();

export type AboutPage = z.infer<typeof AboutPageSchema>;

/**
 * Copy for generated collection pages.
 */
export const CollectionCopySchema = z
  .object({
    /** Heading of the paginated article listing */
    articlesTitle: z.string().min(1),

    /** Sub-heading of the article listing */
    articlesSubtitle: z.string(),

    /** Meta description of the article listing */
    articlesDescription: z.string(),

    /** Heading of the taxonomy index */
    categoriesTitle: z.string().min(1),

    /** Meta description of the taxonomy index */
    categoriesDescription: z.string(),

    /** Meta description of the about page */
    aboutDescription: z.string(),
  })
  .strict();

export type CollectionCopy = z.infer<typeof CollectionCopySchema>;

/**
 * Complete site configuration schema.
 */
export const SiteConfigSchema = z
  .object({
    /** Site name, used in titles and structured data */
    name: z.string().min(1).describe("Human-readable site name"),

    /** Site-wide meta description */
    description: z.string().describe("Default meta description"),

    /** Default author for documents that do not name one */
    author: z.string().min(1).describe("Default document author"),

    /** Small line above the hero title */
    eyebrow: z.string().describe("Hero eyebrow text"),

    /** Hero heading on the home page */
    heroTitle: z.string().describe("Home page hero heading"),

    /** Hero sub-heading on the home page */
    heroSubtitle: z.string().describe("Home page hero sub-heading"),

    /** Short highlight lines shown beside the hero */
    heroPanel: z.array(z.string().min(1)).describe("Hero panel lines"),

    /** Footer copyright line */
    copyright: z.string().describe("Footer copyright line"),

    /** Cover image used by documents without one (site-root-relative) */
    defaultImage: z
      .string()
      .min(1)
      .describe("Site-root-relative default cover image"),

    /** Absolute base URL of the published site, no trailing slash */
    baseUrl: z
      .string()
      .url()
      .regex(/^https?:\/\//, "must use http or https")
      .refine((url) => !url.endsWith("/"), {
        message: "must not end with a slash",
      })
      .describe("Absolute base URL used for canonical links and the sitemap"),

    /** Documents per listing page */
    pageSize: z
      .number()
      .int()
      .min(1)
      .describe("Number of documents on each listing page"),

    about: AboutPageSchema.describe("About page copy"),

    copy: CollectionCopySchema.describe("Collection page copy"),
  })
  .strict();

export type SiteConfig = z.infer<typeof SiteConfigSchema>;
