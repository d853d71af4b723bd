/**
 * Results Module
 *
 * Turns the products recorded during a crawl into the raw and final result
 * documents. The final document holds one entry per normalized product URL.
 */

import type { CrawlResults, ProductRecord } from '../types/index.js';

const TRACKING_PARAMS = new Set(['gclid', 'fbclid', 'msclkid', 'mc_cid', 'mc_eid', '_ga', 'ref', 'ref_src']);

function isTrackingParam(name: string): boolean {
  const key = name.toLowerCase();
  return key.startsWith('utm_') || TRACKING_PARAMS.has(key);
}

function keptQuery(parsed: URL): string {
  const kept = new URLSearchParams();
  for (const [name, value] of parsed.searchParams) {
    if (!isTrackingParam(name)) kept.append(name, value);
  }
  const query = kept.toString();
  return query ? `?${query}` : '';
}

/**
 * Product URL as emitted in the final document: tracking parameters and
 * fragment removed, path case kept. Unparseable input is returned trimmed.
 */
export function cleanProductUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    return url.trim();
  }
  return `${parsed.protocol}//${parsed.host}${parsed.pathname}${keptQuery(parsed)}`;
}

/**
 * Dedup key of a product URL: the cleaned URL with the path lowercased and
 * the trailing slash dropped except at the root. Unparseable input is
 * returned trimmed.
 */
export function normalizeProductUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    return url.trim();
  }

  let path = parsed.pathname.toLowerCase();
  if (path.length > 1 && path.endsWith('/')) {
    path = path.replace(/\/+$/, '') || '/';
  }

  return `${parsed.protocol}//${parsed.host}${path}${keptQuery(parsed)}`;
}

export function normalizeProductName(name: string): string {
  return name.replace(/\s+/g, ' ').trim();
}

export interface DedupResult {
  products: ProductRecord[];
  /** Entries dropped because their normalized URL was already present */
  duplicates: number;
}

/**
 * Keep the first product per dedup key, emitting cleaned entries
 */
export function deduplicateProducts(products: readonly ProductRecord[]): DedupResult {
  const seen = new Set<string>();
  const unique: ProductRecord[] = [];
  let duplicates = 0;

  for (const product of products) {
    const key = normalizeProductUrl(product.url);
    if (seen.has(key)) {
      duplicates++;
      continue;
    }
    seen.add(key);
    unique.push({ productName: normalizeProductName(product.productName), url: cleanProductUrl(product.url) });
  }

  return { products: unique, duplicates };
}

export interface ResultInput {
  products: readonly ProductRecord[];
  pagesProcessed: number;
  totalNodes: number;
  baseUrl: string;
  domain: string;
}

export interface ResultDocuments {
  raw: CrawlResults;
  final: CrawlResults;
  duplicatesRemoved: number;
}

export function buildResultDocuments(input: ResultInput): ResultDocuments {
  const base = {
    pages_processed: input.pagesProcessed,
    total_nodes: input.totalNodes,
    base_url: input.baseUrl,
    domain: input.domain,
  };
  const { products, duplicates } = deduplicateProducts(input.products);

  return {
    raw: { products: input.products.map((p) => ({ ...p })), ...base },
    final: { products, ...base },
    duplicatesRemoved: duplicates,
  };
}

/**
 * Location of the cleaned artifact: `dir/name.json` -> `dir/name_cleaned.json`
 */
export function cleanedOutputPath(output: string): string {
  const slash = output.lastIndexOf('/');
  const dot = output.lastIndexOf('.');
  if (dot > slash + 1) {
    return `${output.slice(0, dot)}_cleaned${output.slice(dot)}`;
  }
  return `${output}_cleaned`;
}
