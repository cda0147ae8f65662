/**
 * Allowed Hosts Middleware
 *
 * Rejects requests addressed to a host the server does not answer for.
 */

import { HttpRequest } from '../http/request.ts';
import { HttpResponse } from '../http/response.ts';
import type { ListenerMiddleware } from './registry.ts';

/**
 * Only let through requests whose Host header, port stripped, is listed.
 * An empty list lets everything through.
 */
export function allowedHostsMiddleware(hosts: readonly string[]): ListenerMiddleware {
  if (hosts.length === 0) {
    return (next) => next;
  }
  const allowed = new Set(hosts.map((host) => host.toLowerCase()));

  return (next) => async (req, res) => {
    const request = new HttpRequest(req);
    if (!allowed.has(stripPort(request.host).toLowerCase())) {
      new HttpResponse(res, request.path).error(421, '421 - Misdirected Request');
      return;
    }
    await next(req, res);
  };
}

/**
 * Host header without its port; bracketed IPv6 literals keep their brackets
 */
export function stripPort(host: string): string {
  if (host.startsWith('[')) {
    const end = host.indexOf(']');
    return end === -1 ? host : host.slice(0, end + 1);
  }
  const colon = host.lastIndexOf(':');
  return colon === -1 ? host : host.slice(0, colon);
}
