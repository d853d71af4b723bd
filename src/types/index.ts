/**
 * Core type definitions for Product Explorer
 *
 * This module exports the shared data model used across the system.
 */

/**
 * Identifier for one crawl session
 * Format: crawl_<hash>
 */
export type SessionId = string;

// ============================================================================
// Tree and Candidate Types
// ============================================================================

/**
 * Node lifecycle states. Transitions only move forward:
 * Unexplored -> Explored -> CompletelyExplored
 */
export type NodeState = 'Unexplored' | 'Explored' | 'CompletelyExplored';

/**
 * Raw link as produced by the page parser or a dynamic-content handler,
 * before admission into the tree
 */
export interface RawLink {
  /** Absolute URL with the fragment removed */
  absoluteUrl: string;
  /** Path + query relative to the site root */
  relativePath: string;
  anchorText: string;
  /** Surrounding markup hint, e.g. `li.product-card > a.title` */
  tagContext: string;
}

/**
 * Ephemeral candidate inside one scoring batch
 */
export interface LinkInfo extends RawLink {
  /** Position within the current scoring batch */
  id: number;
  /** Null until scored */
  score: number | null;
  /** Present only if score > 9 */
  productName?: string;
}

/**
 * Title/description of the page whose links are being scored
 */
export interface NodeContext {
  url: string;
  title: string;
  description: string;
}

// ============================================================================
// AI Contract Types
// ============================================================================

/**
 * Score returned by the gateway for a single candidate
 */
export interface LinkScore {
  id: number;
  score: number;
  productName?: string;
}

/**
 * Dynamic-loading controls the gateway may report.
 * InfiniteScroll is never requested from the gateway; it is always tried.
 */
export type DetectableTrigger = 'Pagination' | 'LoadMore' | 'Tabs' | 'Accordions' | 'Expanders';

export type TriggerType = DetectableTrigger | 'InfiniteScroll';

export type DynamicLoadingVerdict =
  | { id: number; triggerType: DetectableTrigger }
  | { id: -1 };

export type AIProvider = 'anthropic' | 'openai' | 'google';

// ============================================================================
// Output Types
// ============================================================================

export interface ProductRecord {
  productName: string;
  url: string;
}

/**
 * Output document shape shared by the raw and final artifacts
 */
export interface CrawlResults {
  products: ProductRecord[];
  pages_processed: number;
  total_nodes: number;
  base_url: string;
  domain: string;
}

/**
 * Counters reported at the end of a crawl
 */
export interface CrawlSummary {
  pagesProcessed: number;
  totalNodes: number;
  productsFound: number;
  productsAfterDedup: number;
  duplicateEncounters: number;
  fetchFailures: number;
  aiCalls: number;
  durationMs: number;
}

// ============================================================================
// Module Result Envelope
// ============================================================================

/**
 * Module result wrapper returned by task-level entry points
 */
export interface ModuleResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: unknown;
  };
  metadata: {
    sessionId: SessionId;
    module: string;
    timestamp: string;
    duration?: number;
  };
}
