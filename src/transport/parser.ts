import { load, type CheerioAPI } from 'cheerio';
import type { RawLink } from '../types/index.js';

/**
 * Title, description and link candidates of one HTML page
 */
export interface ParsedPage {
  title: string;
  description: string;
  links: RawLink[];
}

export interface PageParser {
  parse(html: string, pageUrl: string): ParsedPage;
}

const SKIPPED_SCHEMES = ['javascript:', 'mailto:', 'tel:', 'data:', 'sms:', 'ftp:'];

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Canonical form of an absolute URL: WHATWG-serialized (so a bare origin
 * gains its "/" path) with the fragment removed. Null when unparseable.
 */
export function canonicalUrl(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    return null;
  }
  parsed.hash = '';
  return parsed.toString();
}

/**
 * Resolve an href against the page URL.
 * Returns null for empty, fragment-only, non-navigational and non-http(s)
 * links.
 */
export function resolveLink(
  href: string | undefined,
  baseUrl: string
): { absoluteUrl: string; relativePath: string } | null {
  const raw = href?.trim();
  if (!raw || raw.startsWith('#')) return null;
  const lower = raw.toLowerCase();
  if (SKIPPED_SCHEMES.some((scheme) => lower.startsWith(scheme))) return null;

  let resolved: URL;
  try {
    resolved = new URL(raw, baseUrl);
  } catch {
    return null;
  }
  if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') return null;

  resolved.hash = '';
  return {
    absoluteUrl: resolved.toString(),
    relativePath: `${resolved.pathname}${resolved.search}`,
  };
}

function describeTag(tagName: string | undefined, classAttr: string | undefined): string {
  const tag = tagName?.toLowerCase() ?? '';
  const className = collapseWhitespace(classAttr ?? '').split(' ')[0];
  return className ? `${tag}.${className}` : tag;
}

/**
 * Extract anchor candidates in document order, one per absolute URL. A later
 * duplicate fills in anchor text when the first occurrence had none (e.g. an
 * image link followed by a text link to the same product).
 */
export function extractLinks($: CheerioAPI, pageUrl: string): RawLink[] {
  const baseHref = $('base[href]').first().attr('href');
  let baseUrl = pageUrl;
  if (baseHref) {
    try {
      baseUrl = new URL(baseHref, pageUrl).toString();
    } catch {
      baseUrl = pageUrl;
    }
  }

  const links: RawLink[] = [];
  const byUrl = new Map<string, RawLink>();

  $('a[href]').each((_, el) => {
    const anchor = $(el);
    const resolved = resolveLink(anchor.attr('href'), baseUrl);
    if (!resolved) return;

    const anchorText =
      collapseWhitespace(anchor.text()) ||
      collapseWhitespace(anchor.attr('title') ?? '') ||
      collapseWhitespace(anchor.attr('aria-label') ?? '') ||
      collapseWhitespace(anchor.find('img[alt]').first().attr('alt') ?? '');

    const existing = byUrl.get(resolved.absoluteUrl);
    if (existing) {
      if (!existing.anchorText && anchorText) existing.anchorText = anchorText;
      return;
    }

    const parent = anchor.parent();
    const parentHint = parent.length > 0 ? describeTag(parent.prop('tagName'), parent.attr('class')) : '';
    const selfHint = describeTag(anchor.prop('tagName'), anchor.attr('class'));
    const link: RawLink = {
      ...resolved,
      anchorText,
      tagContext: parentHint ? `${parentHint} > ${selfHint}` : selfHint,
    };
    byUrl.set(resolved.absoluteUrl, link);
    links.push(link);
  });

  return links;
}

/**
 * Parse an HTML page into title, description and link candidates
 */
export function parsePage(html: string, pageUrl: string): ParsedPage {
  const $ = load(html);
  const title = collapseWhitespace($('title').first().text()) || collapseWhitespace($('h1').first().text());
  const description = collapseWhitespace(
    $('meta[name="description"]').attr('content') ??
      $('meta[property="og:description"]').attr('content') ??
      ''
  );
  return { title, description, links: extractLinks($, pageUrl) };
}

/**
 * Default cheerio-backed parser
 */
export const cheerioPageParser: PageParser = {
  parse: parsePage,
};
