/**
 * Tree Module
 *
 * The website graph explored by the engine. Nodes live in an arena owned by
 * WebsiteTree; parent links are ids, never object references, so completion
 * checks and propagation walk the arena rather than a pointer graph.
 *
 * Completion rule: a node is CompletelyExplored iff it is a confirmed product,
 * its own score is below 1, or it has been explored and every child (possibly
 * none) is CompletelyExplored.
 */

import type { NodeState } from '../types/index.js';

export type NodeId = number;

/** Neutral score assigned to the root */
export const ROOT_SCORE = 10;

/** Scores below this are never explored */
export const SKIP_THRESHOLD = 1;

/** Scores above this are product pages */
export const PRODUCT_THRESHOLD = 9;

const STATE_RANK: Record<NodeState, number> = {
  Unexplored: 0,
  Explored: 1,
  CompletelyExplored: 2,
};

export interface WebsiteNode {
  readonly id: NodeId;
  readonly url: string;
  readonly parentId: NodeId | null;
  readonly childIds: NodeId[];
  readonly depth: number;
  readonly ownScore: number;
  state: NodeState;
  relativePath: string;
  anchorText: string;
  title: string | null;
  description: string | null;
  productName: string | null;
}

export interface NewChild {
  url: string;
  score: number;
  relativePath?: string;
  anchorText?: string;
  productName?: string | null;
}

// ============================================================================
// Domain Scope
// ============================================================================

/**
 * Normalized hostname of a URL, or null when the URL has no usable host.
 * Only http(s) URLs carry a crawlable host.
 */
export function hostnameOf(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return null;
  }
  const hostname = parsed.hostname.trim().toLowerCase().replace(/\.$/, '');
  return hostname.length > 0 ? hostname : null;
}

/**
 * Normalize a bare domain string ("Example.COM.") for comparison
 */
export function normalizeDomain(domain: string): string {
  return domain.trim().toLowerCase().replace(/\.$/, '');
}

/**
 * Check whether a URL belongs to the crawl scope.
 * Scope is exact hostname equality; subdomains are different scopes and an
 * empty domain or host never matches.
 */
export function isSameDomain(url: string, domain: string): boolean {
  const target = normalizeDomain(domain);
  if (target.length === 0) return false;
  const host = hostnameOf(url);
  return host !== null && host === target;
}

// ============================================================================
// Website Tree
// ============================================================================

export class WebsiteTree {
  private readonly nodes: WebsiteNode[] = [];
  private readonly byUrl = new Map<string, NodeId>();
  private readonly visited = new Set<string>();

  readonly root: WebsiteNode;
  readonly domain: string;

  constructor(rootUrl: string, rootScore: number = ROOT_SCORE) {
    const host = hostnameOf(rootUrl);
    if (host === null) {
      throw new Error(`Root URL has no crawlable host: ${rootUrl}`);
    }
    this.domain = host;
    this.root = this.createNode(rootUrl, null, rootScore, {
      relativePath: '/',
      anchorText: '',
      productName: null,
    });
  }

  get size(): number {
    return this.nodes.length;
  }

  get(id: NodeId): WebsiteNode {
    const node = this.nodes[id];
    if (!node) {
      throw new Error(`Unknown node id ${id}`);
    }
    return node;
  }

  findByUrl(url: string): WebsiteNode | undefined {
    const id = this.byUrl.get(url);
    return id === undefined ? undefined : this.nodes[id];
  }

  parentOf(node: WebsiteNode): WebsiteNode | null {
    return node.parentId === null ? null : this.get(node.parentId);
  }

  childrenOf(node: WebsiteNode): WebsiteNode[] {
    return node.childIds.map((id) => this.get(id));
  }

  /**
   * Ancestors from the direct parent up to and including the root
   */
  ancestorsOf(node: WebsiteNode): WebsiteNode[] {
    const ancestors: WebsiteNode[] = [];
    let current = this.parentOf(node);
    while (current) {
      ancestors.push(current);
      current = this.parentOf(current);
    }
    return ancestors;
  }

  all(): readonly WebsiteNode[] {
    return this.nodes;
  }

  // --------------------------------------------------------------------------
  // Visited set
  // --------------------------------------------------------------------------

  hasVisited(url: string): boolean {
    return this.visited.has(url);
  }

  /**
   * Claim a URL in the global visited set.
   * Returns false when the URL was already claimed.
   */
  claim(url: string): boolean {
    if (this.visited.has(url)) return false;
    this.visited.add(url);
    return true;
  }

  // --------------------------------------------------------------------------
  // Mutation
  // --------------------------------------------------------------------------

  /**
   * Add a child under parent. The URL must be unique in the tree; callers
   * normally claim it in the visited set during admission first.
   */
  addChild(parent: WebsiteNode, child: NewChild): WebsiteNode {
    if (this.byUrl.has(child.url)) {
      throw new Error(`Node already exists for ${child.url}`);
    }
    this.visited.add(child.url);
    const node = this.createNode(child.url, parent, child.score, {
      relativePath: child.relativePath ?? '',
      anchorText: child.anchorText ?? '',
      productName: child.productName ?? null,
    });
    parent.childIds.push(node.id);
    return node;
  }

  /**
   * Move a node forward in its lifecycle. Backward transitions are ignored.
   * Returns true when the state changed.
   */
  advance(node: WebsiteNode, state: NodeState): boolean {
    if (STATE_RANK[state] <= STATE_RANK[node.state]) return false;
    node.state = state;
    return true;
  }

  /**
   * Whether the completion rule holds for node
   */
  isCompletionSatisfied(node: WebsiteNode): boolean {
    if (node.state === 'CompletelyExplored') return true;
    if (node.productName !== null) return true;
    if (node.ownScore < SKIP_THRESHOLD) return true;
    if (node.state !== 'Explored') return false;
    return node.childIds.every((id) => this.get(id).state === 'CompletelyExplored');
  }

  /**
   * Mark node CompletelyExplored and walk upward, completing every ancestor
   * whose condition now holds. Stops at the first ancestor still incomplete.
   *
   * @returns nodes that transitioned to CompletelyExplored, in order
   */
  markCompleteAndPropagate(node: WebsiteNode): WebsiteNode[] {
    const completed: WebsiteNode[] = [];
    if (!this.advance(node, 'CompletelyExplored')) {
      return completed;
    }
    completed.push(node);

    let parent = this.parentOf(node);
    while (parent && parent.state !== 'CompletelyExplored' && this.isCompletionSatisfied(parent)) {
      this.advance(parent, 'CompletelyExplored');
      completed.push(parent);
      parent = this.parentOf(parent);
    }
    return completed;
  }

  countByState(): Record<NodeState, number> {
    const counts: Record<NodeState, number> = {
      Unexplored: 0,
      Explored: 0,
      CompletelyExplored: 0,
    };
    for (const node of this.nodes) {
      counts[node.state]++;
    }
    return counts;
  }

  private createNode(
    url: string,
    parent: WebsiteNode | null,
    ownScore: number,
    extra: Pick<WebsiteNode, 'relativePath' | 'anchorText' | 'productName'>
  ): WebsiteNode {
    const node: WebsiteNode = {
      id: this.nodes.length,
      url,
      parentId: parent ? parent.id : null,
      childIds: [],
      depth: parent ? parent.depth + 1 : 0,
      ownScore,
      state: 'Unexplored',
      title: null,
      description: null,
      ...extra,
    };
    this.nodes.push(node);
    this.byUrl.set(url, node.id);
    this.visited.add(url);
    return node;
  }
}

// ============================================================================
// Scoring
// ============================================================================

/**
 * Mean own score over a node and its ancestors. The root is the neutral
 * baseline and only counts for itself, so root -> 8 -> 6 -> 4 yields 6.
 */
export function averageAncestralScore(tree: WebsiteTree, node: WebsiteNode): number {
  if (node.parentId === null) {
    return node.ownScore;
  }
  let sum = node.ownScore;
  let count = 1;
  for (const ancestor of tree.ancestorsOf(node)) {
    if (ancestor.parentId === null) break;
    sum += ancestor.ownScore;
    count++;
  }
  return sum / count;
}

// ============================================================================
// Rendering
// ============================================================================

const STATE_MARK: Record<NodeState, string> = {
  Unexplored: '○',
  Explored: '◐',
  CompletelyExplored: '✓',
};

/**
 * Text view of the tree: state marker, path, completed/total children, and
 * the product name where one was recorded.
 */
export function renderTree(tree: WebsiteTree): string {
  const lines: string[] = [];

  const visit = (node: WebsiteNode, prefix: string, isLast: boolean, isRoot: boolean): void => {
    const children = tree.childrenOf(node);
    const done = children.filter((c) => c.state === 'CompletelyExplored').length;
    const label = isRoot ? node.url : node.relativePath || node.url;
    const product = node.productName ? ` "${node.productName}"` : '';
    const connector = isRoot ? '' : isLast ? '└── ' : '├── ';
    lines.push(`${prefix}${connector}${STATE_MARK[node.state]} ${label} [${done}/${children.length}]${product}`);

    const childPrefix = isRoot ? '' : prefix + (isLast ? '    ' : '│   ');
    children.forEach((child, index) => {
      visit(child, childPrefix, index === children.length - 1, false);
    });
  };

  visit(tree.root, '', true, true);
  return lines.join('\n');
}
