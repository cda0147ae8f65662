/**
 * Route Pattern Utilities
 *
 * Splits paths into segments, classifies pattern segments and
 * builds URLs back from patterns.
 *
 * Segment syntax:
 * - `users`        static literal
 * - `:id`          named parameter, matches any non-empty segment
 * - `{id:[0-9]+}`  named parameter constrained by a regular expression
 */

import { InvalidRoutePatternError } from '../http/errors.ts';

export type PatternParams = Record<string, string>;

export type Segment =
  | { kind: 'static'; literal: string }
  | { kind: 'param'; name: string }
  | { kind: 'regex'; name: string; source: string; matcher: RegExp };

export type SegmentKind = Segment['kind'];

/**
 * Split a path into its '/'-delimited segments.
 * Leading and trailing slashes are ignored, so '/' yields a single empty segment.
 */
export function splitPath(path: string): string[] {
  return trimSlashes(path).split('/');
}

/**
 * Join a group prefix and a route path, collapsing duplicate slashes
 */
export function joinPaths(prefix: string, path: string): string {
  const joined = `/${prefix}/${path}`.replace(/\/{2,}/g, '/');
  return joined.length > 1 && joined.endsWith('/') ? joined.slice(0, -1) : joined;
}

/**
 * Classify one pattern segment, compiling regex constraints eagerly
 */
export function parseSegment(part: string, caseSensitive = false): Segment {
  if (part.startsWith(':')) {
    const name = part.slice(1);
    checkParamName(part, name);
    return { kind: 'param', name };
  }

  if (part.startsWith('{') && part.endsWith('}')) {
    const content = part.slice(1, -1);
    const colon = content.indexOf(':');
    if (colon === -1) {
      return staticSegment(part, caseSensitive);
    }

    const name = content.slice(0, colon);
    const source = content.slice(colon + 1);
    checkParamName(part, name);
    if (source === '') {
      throw new InvalidRoutePatternError(part, 'regular expression is empty');
    }

    return { kind: 'regex', name, source, matcher: compileSegmentRegex(part, source, caseSensitive) };
  }

  return staticSegment(part, caseSensitive);
}

function checkParamName(part: string, name: string): void {
  if (name === '') {
    throw new InvalidRoutePatternError(part, 'parameter name is empty');
  }
  if (name === '__proto__') {
    throw new InvalidRoutePatternError(part, "'__proto__' cannot be a parameter name");
  }
}

/**
 * Text used to tell sibling nodes of the same kind apart
 */
export function segmentKey(segment: Segment): string {
  switch (segment.kind) {
    case 'static':
      return segment.literal;
    case 'param':
      return segment.name;
    case 'regex':
      return `${segment.name}:${segment.source}`;
  }
}

/**
 * Render a segment back into pattern syntax
 */
export function formatSegment(segment: Segment): string {
  switch (segment.kind) {
    case 'static':
      return segment.literal;
    case 'param':
      return `:${segment.name}`;
    case 'regex':
      return `{${segment.name}:${segment.source}}`;
  }
}

/**
 * Percent-decode a request segment; malformed escapes keep the raw text
 */
export function decodeSegment(segment: string): string {
  if (!segment.includes('%')) return segment;
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Build a URL from a pattern and parameters
 */
export function buildUrl(
  pattern: string,
  params: PatternParams,
  query?: Record<string, string | string[]>
): string {
  const segments = splitPath(pattern).map((part) => {
    const segment = parseSegment(part, true);
    if (segment.kind === 'static') return part;

    const value = params[segment.name];
    if (value === undefined) {
      throw new InvalidRoutePatternError(pattern, `missing value for parameter '${segment.name}'`);
    }
    if (segment.kind === 'regex' && !segment.matcher.test(value)) {
      throw new InvalidRoutePatternError(
        pattern,
        `value '${value}' does not satisfy {${segment.name}:${segment.source}}`
      );
    }
    return encodeURIComponent(value);
  });

  let url = '/' + segments.join('/');

  // Add query string
  if (query && Object.keys(query).length > 0) {
    const searchParams = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      if (Array.isArray(value)) {
        for (const v of value) {
          searchParams.append(key, v);
        }
      } else {
        searchParams.append(key, value);
      }
    }
    url += '?' + searchParams.toString();
  }

  return url;
}

/**
 * Parameter names declared by a pattern, in order
 */
export function parsePathParams(pattern: string): string[] {
  const params: string[] = [];

  for (const part of splitPath(pattern)) {
    const segment = parseSegment(part, true);
    if (segment.kind !== 'static') {
      params.push(segment.name);
    }
  }

  return params;
}

function staticSegment(literal: string, caseSensitive: boolean): Segment {
  return { kind: 'static', literal: caseSensitive ? literal : literal.toLowerCase() };
}

function compileSegmentRegex(part: string, source: string, caseSensitive: boolean): RegExp {
  try {
    return new RegExp(`^(?:${source})$`, caseSensitive ? '' : 'i');
  } catch (error) {
    throw new InvalidRoutePatternError(part, 'regular expression does not compile', { cause: error });
  }
}

function trimSlashes(path: string): string {
  let start = 0;
  let end = path.length;
  while (start < end && path[start] === '/') start++;
  while (end > start && path[end - 1] === '/') end--;
  return path.slice(start, end);
}
