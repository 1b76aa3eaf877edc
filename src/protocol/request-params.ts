import type { OAuthContext } from '../types/hono.js';
import type { RequestParams } from '../types/authorize-request.js';
import { CONTENT_TYPE_FORM, HEADER_CONTENT_TYPE } from '../config/constants.js';
import { OAuthError } from '../errors/oauth-error.js';

/**
 * A form body with repeated fields kept; file parts are dropped
 */
export async function readFormParams(c: OAuthContext): Promise<RequestParams> {
  if (!c.req.header(HEADER_CONTENT_TYPE)?.includes(CONTENT_TYPE_FORM)) {
    throw OAuthError.invalidRequest(`Content-Type must be ${CONTENT_TYPE_FORM}`);
  }

  const body = await c.req.parseBody({ all: true });
  const params: RequestParams = {};
  for (const [key, value] of Object.entries(body)) {
    const values = (Array.isArray(value) ? value : [value]).filter((v): v is string => typeof v === 'string');
    if (values.length > 0) {
      params[key] = values.length === 1 ? values[0] : values;
    }
  }
  return params;
}

/**
 * Query parameters for GET, the form body otherwise
 */
export async function readRequestParams(c: OAuthContext): Promise<RequestParams> {
  return c.req.method === 'GET' ? c.req.queries() : readFormParams(c);
}

/**
 * Single-valued view of the parameters plus every `resource` value
 * (RFC 8707 allows the parameter to repeat)
 */
export function splitParams(params: RequestParams): { form: Record<string, string>; resources: string[] } {
  const form: Record<string, string> = {};
  let resources: string[] = [];

  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    const values = Array.isArray(value) ? value : [value];
    if (key === 'resource') {
      resources = values.filter((v) => v !== '');
      continue;
    }
    const [first] = values;
    if (first !== undefined) form[key] = first;
  }

  return { form, resources };
}
