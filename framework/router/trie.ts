/**
 * Route Trie
 *
 * Prefix tree with one edge per path segment. Every node is tied to the
 * HTTP method it was registered under, so methods branch at every depth
 * rather than only at the leaf.
 */

import { decodeSegment, formatSegment, parseSegment, segmentKey, splitPath } from './patterns.ts';
import type { PatternParams, Segment } from './patterns.ts';

/**
 * How siblings compete for a request segment.
 *
 * - `specificity`: static beats regex beats param; ties go to the earlier registration
 * - `registration`: the first compatible child in registration order wins
 */
export type MatchPrecedence = 'specificity' | 'registration';

export interface RouteTrieOptions {
  precedence?: MatchPrecedence;
  caseSensitive?: boolean;
}

export type TrieLookup<T> =
  | { kind: 'matched'; value: T; params: PatternParams; node: TrieNode<T> }
  | { kind: 'no-handler'; params: PatternParams; node: TrieNode<T> }
  | { kind: 'miss'; params: PatternParams; depth: number };

/**
 * One path segment at one depth of the trie
 */
export class TrieNode<T> {
  readonly segment: Segment | null;
  readonly method: string;
  readonly level: number;
  readonly fullPath: string;
  /** Children in registration order */
  readonly children: TrieNode<T>[] = [];

  private readonly statics = new Map<string, TrieNode<T>>();
  private readonly regexes: TrieNode<T>[] = [];
  private readonly params: TrieNode<T>[] = [];
  private _value: T | undefined;

  constructor(segment: Segment | null = null, method = '', parent?: TrieNode<T>) {
    this.segment = segment;
    this.method = method;
    this.level = parent ? parent.level + 1 : 0;
    this.fullPath = parent && segment ? `${parent.fullPath}/${formatSegment(segment)}` : '';
  }

  get value(): T | undefined {
    return this._value;
  }

  get hasValue(): boolean {
    return this._value !== undefined;
  }

  /**
   * Attach the terminal value; returns false if one is already set
   */
  setValue(value: T): boolean {
    if (this._value !== undefined) return false;
    this._value = value;
    return true;
  }

  /**
   * Find the sibling registered with the same (kind, text, method)
   */
  findChild(segment: Segment, method: string): TrieNode<T> | undefined {
    if (segment.kind === 'static') {
      return this.statics.get(staticKey(method, segment.literal));
    }
    const bucket = segment.kind === 'regex' ? this.regexes : this.params;
    const key = segmentKey(segment);
    return bucket.find((child) => child.method === method && child.segment !== null && segmentKey(child.segment) === key);
  }

  /**
   * Append a new child; never reorders existing ones
   */
  addChild(segment: Segment, method: string): TrieNode<T> {
    const child = new TrieNode<T>(segment, method, this);
    this.children.push(child);

    switch (segment.kind) {
      case 'static':
        this.statics.set(staticKey(method, segment.literal), child);
        break;
      case 'regex':
        this.regexes.push(child);
        break;
      case 'param':
        this.params.push(child);
        break;
    }

    return child;
  }

  /**
   * Param children already registered for a method
   */
  paramChildren(method: string): TrieNode<T>[] {
    return this.params.filter((child) => child.method === method);
  }

  /**
   * Pick the child that takes a request segment.
   * `raw` is the decoded segment, `normalized` its case-folded form.
   */
  selectChild(
    method: string,
    raw: string,
    normalized: string,
    precedence: MatchPrecedence
  ): TrieNode<T> | undefined {
    if (precedence === 'registration') {
      return this.children.find((child) => child.accepts(method, raw, normalized));
    }

    return (
      this.statics.get(staticKey(method, normalized)) ??
      this.regexes.find((child) => child.accepts(method, raw, normalized)) ??
      this.params.find((child) => child.accepts(method, raw, normalized))
    );
  }

  /**
   * Whether this node is compatible with a request segment
   */
  accepts(method: string, raw: string, normalized: string): boolean {
    if (this.method !== method || this.segment === null) return false;

    switch (this.segment.kind) {
      case 'static':
        return this.segment.literal === normalized;
      case 'param':
        return raw !== '';
      case 'regex':
        return this.segment.matcher.test(raw);
    }
  }
}

/**
 * Trie of routes keyed by method and path pattern
 */
export class RouteTrie<T> {
  readonly root = new TrieNode<T>();
  readonly precedence: MatchPrecedence;
  readonly caseSensitive: boolean;

  constructor(options: RouteTrieOptions = {}) {
    this.precedence = options.precedence ?? 'specificity';
    this.caseSensitive = options.caseSensitive ?? false;
  }

  /**
   * Walk (and extend) the trie along a pattern, returning its terminal node.
   * `onCreate` is told about every new node, e.g. to warn about shadowed siblings.
   */
  insert(
    method: string,
    pattern: string,
    onCreate?: (node: TrieNode<T>, parent: TrieNode<T>) => void
  ): TrieNode<T> {
    const segments = splitPath(pattern).map((part) => parseSegment(part, this.caseSensitive));
    let current = this.root;

    for (const segment of segments) {
      const existing = current.findChild(segment, method);
      if (existing) {
        current = existing;
        continue;
      }

      const created = current.addChild(segment, method);
      onCreate?.(created, current);
      current = created;
    }

    return current;
  }

  /**
   * Match a request path for a method, binding parameters on the way down.
   * Bound values are case-folded unless the trie is case-sensitive.
   */
  lookup(method: string, path: string): TrieLookup<T> {
    const params: PatternParams = {};
    const parts = splitPath(path);
    let current = this.root;

    for (let depth = 0; depth < parts.length; depth++) {
      const raw = decodeSegment(parts[depth]);
      const normalized = this.caseSensitive ? raw : raw.toLowerCase();
      const child = current.selectChild(method, raw, normalized, this.precedence);

      if (!child) {
        return { kind: 'miss', params, depth };
      }

      if (child.segment !== null && child.segment.kind !== 'static') {
        params[child.segment.name] = normalized;
      }
      current = child;
    }

    const value = current.value;
    if (value === undefined) {
      return { kind: 'no-handler', params, node: current };
    }
    return { kind: 'matched', value, params, node: current };
  }

  /**
   * Depth-first listing of terminal nodes, in registration order
   */
  terminals(): TrieNode<T>[] {
    const found: TrieNode<T>[] = [];
    const visit = (node: TrieNode<T>): void => {
      if (node.hasValue) found.push(node);
      for (const child of node.children) visit(child);
    };
    visit(this.root);
    return found;
  }
}

function staticKey(method: string, literal: string): string {
  return `${method} ${literal}`;
}
