// Shapes shared between the feed source, the curation core and the renderer

// Media attributes exactly as they appear in the feed (numbers stay strings)
export interface MediaNode {
  url?: string;
  type?: string;
  medium?: string;
  width?: string;
  height?: string;
}

export interface Enclosure {
  url?: string;
  type?: string;
}

export interface FeedEntry {
  title: string;
  summary: string;           // Markup-bearing summary/description, may be empty
  link: string;
  publishedAt?: Date;        // Absent when the feed gives no parseable date
  contentHtml?: string;      // Rich content block (content:encoded / Atom content)
  mediaContent: MediaNode[];
  mediaThumbnails: MediaNode[];
  enclosures: Enclosure[];
}

export interface FeedDocument {
  sourceTitle: string;
  entries: FeedEntry[];
}

export interface Article {
  readonly title: string;
  readonly summary: string;  // Cleaned plain text
  readonly link: string;
  readonly publishedAt: Date;
  readonly sourceName: string;
  readonly imageUrl?: string;
}

export interface ImageCandidate {
  url: string;
  priority: number;
}

export interface CurationResult {
  featured: Article[];
  regular: Article[];
  totalAnalyzed: number;
  feedsProcessed: number;
  feedsFailed: string[];
}

// Collaborator interfaces consumed by the pipeline

export interface FeedSource {
  fetch(feedUrl: string): Promise<FeedDocument>;
}

export interface CompletionService {
  complete(prompt: string, model: string): Promise<string>;
}

export interface CurationConfig {
  feeds: string[];
  topics: string[];
  model: string;
  imagesEnabled: boolean;
  featuredEnabled: boolean;
}
