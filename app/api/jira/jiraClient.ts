// app/api/jira/jiraClient.ts
import type { JsonObject, JsonValue } from '../../../types';

export type JiraConfig = {
  baseUrl: string;
  username: string;
  apiToken: string;
  /** custom field ids read by the row normalizer */
  fieldIds: JiraFieldIds;
};

export type JiraFieldIds = {
  catScope: string;
  itPortal: string;
};

export const DEFAULT_FIELD_IDS: JiraFieldIds = {
  catScope: 'customfield_10079',
  itPortal: 'customfield_10065',
};

type Env = Record<string, string | undefined>;

function read(env: Env, name: string, fallback = ''): string {
  const v = env[name];
  return typeof v === 'string' && v.trim() ? v.trim() : fallback;
}

/**
 * Missing credentials are not rejected here: Jira answers the first request
 * with 401 (or fetch fails on an empty base URL) and that surfaces instead.
 */
export function loadJiraConfig(env: Env = process.env): JiraConfig {
  return {
    baseUrl: read(env, 'JIRA_BASE').replace(/\/+$/, ''),
    username: read(env, 'JIRA_EMAIL'),
    apiToken: read(env, 'JIRA_TOKEN'),
    fieldIds: {
      catScope: read(env, 'JIRA_CAT_SCOPE_FIELD', DEFAULT_FIELD_IDS.catScope),
      itPortal: read(env, 'JIRA_IT_PORTAL_FIELD', DEFAULT_FIELD_IDS.itPortal),
    },
  };
}

/** Non-2xx answer from Jira. */
export class HttpError extends Error {
  readonly status: number;
  readonly errorMessages: string[];

  constructor(status: number, errorMessages: string[] = []) {
    super(
      errorMessages.length
        ? errorMessages.join(', ')
        : `Jira returned HTTP ${status}`
    );
    this.name = 'HttpError';
    this.status = status;
    this.errorMessages = errorMessages;
  }
}

export function isJsonObject(v: JsonValue | undefined): v is JsonObject {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

export type QueryParams = Record<string, string>;

export type JiraClient = {
  get(path: string, params?: QueryParams): Promise<JsonValue>;
};

export type FetchLike = (
  input: string,
  init: RequestInit
) => Promise<Response>;

function upstreamMessages(body: unknown): string[] {
  if (!body || typeof body !== 'object' || !('errorMessages' in body)) {
    return [];
  }
  const list = body.errorMessages;
  if (!Array.isArray(list)) return [];
  return list.filter((m): m is string => typeof m === 'string');
}

export function createJiraClient(
  config: JiraConfig,
  fetchImpl: FetchLike = fetch
): JiraClient {
  const auth = Buffer.from(`${config.username}:${config.apiToken}`).toString(
    'base64'
  );

  return {
    async get(path, params) {
      const qs = params ? new URLSearchParams(params).toString() : '';
      const url = `${config.baseUrl}${path}${qs ? `?${qs}` : ''}`;

      const r = await fetchImpl(url, {
        method: 'GET',
        headers: {
          Authorization: `Basic ${auth}`,
          Accept: 'application/json',
        },
        cache: 'no-store',
      });

      if (!r.ok) {
        let body: unknown = null;
        try {
          body = await r.json();
        } catch {
          // error pages are not always JSON; fall back to the status
          body = null;
        }
        throw new HttpError(r.status, upstreamMessages(body));
      }

      const data: JsonValue = await r.json();
      return data;
    },
  };
}
