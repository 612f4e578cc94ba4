/**
 * Snippet Graph
 * =============
 *
 * Undirected graph over snippets, keywords and resource types. A snippet node
 * links to each of its keywords and resource types, so two snippets sharing a
 * resource type sit at distance 2 from each other.
 *
 * Node ids:
 * - `s:<snippet id>`
 * - `k:<keyword>`
 * - `r:<resource type>`
 */

import type { SnippetRecord } from '../kb/types.js';

export type NodeKind = 'snippet' | 'keyword' | 'resource';

export interface GraphStats {
  nodes: number;
  edges: number;
  snippet_nodes: number;
  keyword_nodes: number;
  resource_nodes: number;
  avg_snippet_degree: number;
}

export function snippetNode(id: string): string {
  return `s:${id}`;
}

export function keywordNode(keyword: string): string {
  return `k:${keyword}`;
}

export function resourceNode(type: string): string {
  return `r:${type}`;
}

export function nodeKind(node: string): NodeKind {
  switch (node.slice(0, 2)) {
    case 's:':
      return 'snippet';
    case 'k:':
      return 'keyword';
    default:
      return 'resource';
  }
}

const NO_NEIGHBORS: ReadonlySet<string> = new Set();

export class SnippetGraph {
  private readonly adjacency = new Map<string, Set<string>>();
  private edgeCount = 0;

  constructor(records: readonly SnippetRecord[] = []) {
    for (const record of records) {
      this.addSnippet(record);
    }
  }

  addSnippet(record: SnippetRecord): void {
    const node = snippetNode(record.id);
    this.ensure(node);
    for (const keyword of record.keywords) {
      this.link(node, keywordNode(keyword));
    }
    for (const type of record.resourceTypes) {
      this.link(node, resourceNode(type));
    }
  }

  has(node: string): boolean {
    return this.adjacency.has(node);
  }

  degree(node: string): number {
    return this.adjacency.get(node)?.size ?? 0;
  }

  neighbors(node: string): ReadonlySet<string> {
    return this.adjacency.get(node) ?? NO_NEIGHBORS;
  }

  adjacent(a: string, b: string): boolean {
    return this.adjacency.get(a)?.has(b) ?? false;
  }

  stats(): GraphStats {
    let snippetNodes = 0;
    let keywordNodes = 0;
    let resourceNodes = 0;
    let snippetDegree = 0;

    for (const [node, links] of this.adjacency) {
      switch (nodeKind(node)) {
        case 'snippet':
          snippetNodes++;
          snippetDegree += links.size;
          break;
        case 'keyword':
          keywordNodes++;
          break;
        case 'resource':
          resourceNodes++;
          break;
      }
    }

    return {
      nodes: this.adjacency.size,
      edges: this.edgeCount,
      snippet_nodes: snippetNodes,
      keyword_nodes: keywordNodes,
      resource_nodes: resourceNodes,
      avg_snippet_degree: snippetNodes === 0 ? 0 : snippetDegree / snippetNodes,
    };
  }

  private ensure(node: string): Set<string> {
    let links = this.adjacency.get(node);
    if (links === undefined) {
      links = new Set();
      this.adjacency.set(node, links);
    }
    return links;
  }

  private link(a: string, b: string): void {
    const fromA = this.ensure(a);
    if (fromA.has(b)) return;
    fromA.add(b);
    this.ensure(b).add(a);
    this.edgeCount++;
  }
}
