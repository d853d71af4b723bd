/**
 * Prompt construction and response parsing for the scoring contract.
 * Provider-independent: every gateway variant sends these prompts and runs
 * its raw text through these parsers.
 */

import { z } from 'zod';
import { ParseError } from '../errors/index.js';
import type {
  DetectableTrigger,
  DynamicLoadingVerdict,
  LinkInfo,
  LinkScore,
  NodeContext,
} from '../types/index.js';

export const SYSTEM_PROMPT =
  "You are an architect. You want to find the product information from a supplier's website. " +
  'You are clicking the button to go to the production description page.';

export const DETECTABLE_TRIGGERS: readonly DetectableTrigger[] = [
  'Pagination',
  'LoadMore',
  'Tabs',
  'Accordions',
  'Expanders',
];

/**
 * Candidate as it appears in a prompt
 */
export interface PrunedCandidate {
  id: number;
  relative_path: string;
  anchor_text: string;
  tag_context?: string;
}

export function pruneCandidates(candidates: readonly LinkInfo[]): PrunedCandidate[] {
  return candidates.map((c) => {
    const pruned: PrunedCandidate = {
      id: c.id,
      relative_path: c.relativePath,
      anchor_text: c.anchorText,
    };
    if (c.tagContext) {
      pruned.tag_context = c.tagContext;
    }
    return pruned;
  });
}

function describePage(context: NodeContext): string {
  return [
    `Page URL: ${context.url}`,
    `Page title: ${context.title || '(none)'}`,
    `Page description: ${context.description || '(none)'}`,
  ].join('\n');
}

// ============================================================================
// Prompt Builders
// ============================================================================

export function buildScoringPrompt(context: NodeContext, candidates: readonly LinkInfo[]): string {
  return `${describePage(context)}

You come to a page with a list of links. Here is the ID, relative path and anchor text of each link.
Score them from 0 - 10 according to how likely the link will lead you to the product description page.
A score less than 1 is for links you will never click.
A score higher than 9 is for links you think is very likely to be the product description page of a specific product. For these kind of link, you will also tell the product name.

Links to analyze:
${JSON.stringify(pruneCandidates(candidates), null, 2)}

Please format your response as JSON with the following structure:
[
    {"id": 0, "score": 3.4},
    {"id": 1, "score": 7.8},
    {"id": 2, "score": 9.5, "productName": "Emerald Urethane Trim Enamel"}
]

IMPORTANT:
- Include the 'id' field for each item to match it with the corresponding link
- Provide exactly one score object for each link
- Include 'productName' only when score > 9.0
- Respond with the JSON array only`;
}

export function buildDetectionPrompt(context: NodeContext, candidates: readonly LinkInfo[]): string {
  return `${describePage(context)}

On this page, you found multiple links to product description pages. According to the UI elements on this page, do you think the page uses dynamic loading? If yes, output the element's id and tell its trigger type (select one from: Pagination, Load More, Tabs, Accordions, Expanders), if no, you answer with {"id": -1}.

Here is the list of elements:
${JSON.stringify(pruneCandidates(candidates), null, 2)}

Please format your response as JSON with the following structure:
{"id": 3, "triggerType": "Pagination"}

IMPORTANT:
- If no dynamic loading is detected, return {"id": -1}
- Valid trigger types are: Pagination, Load More, Tabs, Accordions, Expanders
- Respond with the JSON only`;
}

// ============================================================================
// Response Parsing
// ============================================================================

/** Number, or a numeric string such as "7.5" */
const numeric = z.union([z.number(), z.string().trim().min(1).transform(Number).pipe(z.number())]);

const ScoreEntrySchema = z.object({
  id: numeric.pipe(z.number().int()).optional(),
  score: numeric,
  productName: z.string().nullable().optional(),
});

const DetectionEntrySchema = z.object({
  id: numeric.pipe(z.number().int()),
  triggerType: z.string().nullable().optional(),
});

function preview(text: string): string {
  return text.length > 200 ? `${text.slice(0, 200)}...` : text;
}

function stripCodeFences(text: string): string {
  let cleaned = text.trim();
  if (cleaned.startsWith('```json')) {
    cleaned = cleaned.slice(7);
  } else if (cleaned.startsWith('```')) {
    cleaned = cleaned.slice(3);
  }
  if (cleaned.endsWith('```')) {
    cleaned = cleaned.slice(0, -3);
  }
  return cleaned.trim();
}

/**
 * Extract the first JSON value from model output. Tries the whole text, then
 * the outermost array, then the outermost object.
 */
export function extractJson(text: string): unknown {
  const cleaned = stripCodeFences(text);
  const attempts: string[] = [cleaned];

  const arrayStart = cleaned.indexOf('[');
  const arrayEnd = cleaned.lastIndexOf(']');
  if (arrayStart !== -1 && arrayEnd > arrayStart) {
    attempts.push(cleaned.slice(arrayStart, arrayEnd + 1));
  }
  const objectStart = cleaned.indexOf('{');
  const objectEnd = cleaned.lastIndexOf('}');
  if (objectStart !== -1 && objectEnd > objectStart) {
    attempts.push(cleaned.slice(objectStart, objectEnd + 1));
  }

  for (const candidate of attempts) {
    try {
      return JSON.parse(candidate);
    } catch {
      continue;
    }
  }
  throw new ParseError('No JSON found in model response', preview(text));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Unwrap `{"scores": [...]}` style envelopes into the inner array
 */
function asEntryList(value: unknown): unknown[] | null {
  if (Array.isArray(value)) return value;
  if (isRecord(value)) {
    const inner = Object.values(value).find((v) => Array.isArray(v));
    if (Array.isArray(inner)) return inner;
    return [value];
  }
  return null;
}

function clampScore(score: number): number {
  if (!Number.isFinite(score)) return 0;
  return Math.min(10, Math.max(0, score));
}

export interface ParsedScores {
  /** One entry per candidate, in candidate order */
  scores: LinkScore[];
  /** Candidate ids the response did not cover */
  missing: number[];
}

/**
 * Parse a scoring response into one LinkScore per candidate.
 *
 * Entries are matched by id when every entry carries one, otherwise by
 * position. Uncovered candidates score 0; extra entries are ignored.
 *
 * @throws ParseError when the response holds no usable entry
 */
export function parseScoreResponse(text: string, candidates: readonly LinkInfo[]): ParsedScores {
  const entries = asEntryList(extractJson(text));
  if (entries === null) {
    throw new ParseError('Scoring response is not a JSON array', preview(text));
  }

  const valid = entries
    .map((entry) => ScoreEntrySchema.safeParse(entry))
    .flatMap((result) => (result.success ? [result.data] : []));

  if (valid.length === 0 && candidates.length > 0) {
    throw new ParseError('Scoring response has no valid score entries', preview(text));
  }

  const byId = new Map<number, z.infer<typeof ScoreEntrySchema>>();
  const correlateById = valid.every((entry) => entry.id !== undefined);
  if (correlateById) {
    for (const entry of valid) {
      if (entry.id !== undefined && !byId.has(entry.id)) {
        byId.set(entry.id, entry);
      }
    }
  } else {
    candidates.forEach((candidate, index) => {
      const entry = valid[index];
      if (entry) byId.set(candidate.id, entry);
    });
  }

  const missing: number[] = [];
  const scores = candidates.map((candidate): LinkScore => {
    const entry = byId.get(candidate.id);
    if (!entry) {
      missing.push(candidate.id);
      return { id: candidate.id, score: 0 };
    }
    const score = clampScore(entry.score);
    const name = entry.productName?.trim();
    return score > 9 && name ? { id: candidate.id, score, productName: name } : { id: candidate.id, score };
  });

  return { scores, missing };
}

/**
 * Map tolerant trigger spellings ("Load More", "load_more", "tab") onto the
 * canonical trigger names
 */
export function normalizeTriggerType(raw: string): DetectableTrigger | null {
  const key = raw.toLowerCase().replace(/[^a-z]/g, '');
  switch (key) {
    case 'pagination':
    case 'paginate':
    case 'nextpage':
      return 'Pagination';
    case 'loadmore':
    case 'showmore':
      return 'LoadMore';
    case 'tabs':
    case 'tab':
      return 'Tabs';
    case 'accordions':
    case 'accordion':
      return 'Accordions';
    case 'expanders':
    case 'expander':
      return 'Expanders';
    default:
      return null;
  }
}

/**
 * Parse a detection response. The first entry whose id is in the batch and
 * whose trigger is recognised wins; anything else means none found.
 *
 * @throws ParseError when the response holds no JSON
 */
export function parseDetectionResponse(
  text: string,
  batchIds: ReadonlySet<number>
): DynamicLoadingVerdict {
  const entries = asEntryList(extractJson(text));
  if (entries === null) {
    throw new ParseError('Detection response is not JSON object or array', preview(text));
  }

  for (const entry of entries) {
    const parsed = DetectionEntrySchema.safeParse(entry);
    if (!parsed.success) continue;
    const { id, triggerType } = parsed.data;
    if (id === -1 || !batchIds.has(id) || !triggerType) continue;
    const trigger = normalizeTriggerType(triggerType);
    if (trigger) {
      return { id, triggerType: trigger };
    }
  }
  return { id: -1 };
}
