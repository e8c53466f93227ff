// app/normalizeIssue.ts
import {
  NOT_UPDATED,
  UNKNOWN_KEY,
  type CompleteIssueRow,
  type DegradedIssueRow,
  type IssueRow,
  type JsonObject,
  type JsonValue,
  type RawIssue,
} from '../types';
import {
  DEFAULT_FIELD_IDS,
  HttpError,
  isJsonObject,
  type JiraFieldIds,
} from './api/jira/jiraClient';

/** Raised by an extractor when Jira structure is present but malformed. */
export class NormalizationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NormalizationError';
  }
}

type Extracted<T> = { value: T; defaulted: boolean };

const absent = (v: JsonValue | undefined): v is null | undefined =>
  v === undefined || v === null;

function fallbackTo<T>(value: T): Extracted<T> {
  return { value, defaulted: true };
}

function found<T>(value: T): Extracted<T> {
  return { value, defaulted: false };
}

function text(
  v: JsonValue | undefined,
  path: string,
  fallback: string
): Extracted<string> {
  if (absent(v)) return fallbackTo(fallback);
  if (typeof v !== 'string') {
    throw new NormalizationError(`${path} is not a string`);
  }
  return found(v);
}

function objectAt(fields: JsonObject, name: string): JsonObject | null {
  const v = fields[name];
  if (absent(v)) return null;
  if (!isJsonObject(v)) {
    throw new NormalizationError(`fields.${name} is not an object`);
  }
  return v;
}

/* ------------------ per-column extractors ------------------ */

function issueKey(raw: RawIssue) {
  return text(raw.key, 'key', UNKNOWN_KEY);
}

function nameOf(fields: JsonObject, name: 'issuetype' | 'status') {
  const obj = objectAt(fields, name);
  if (!obj) return fallbackTo(NOT_UPDATED);
  return text(obj.name, `fields.${name}.name`, NOT_UPDATED);
}

/** Only the first fix version is reported, whatever else the list holds. */
function firstFixVersion(fields: JsonObject): Extracted<string> {
  const list = fields.fixVersions;
  if (absent(list)) return fallbackTo(NOT_UPDATED);
  if (!Array.isArray(list)) {
    throw new NormalizationError('fields.fixVersions is not a list');
  }
  if (list.length === 0) return fallbackTo(NOT_UPDATED);

  const first = list[0];
  if (!isJsonObject(first) || typeof first.name !== 'string') {
    throw new NormalizationError('fields.fixVersions[0] has no name');
  }
  return found(first.name);
}

function projectKey(fields: JsonObject): Extracted<string> {
  const project = objectAt(fields, 'project');
  if (!project) return fallbackTo(NOT_UPDATED);
  if (typeof project.key !== 'string') {
    throw new NormalizationError('fields.project has no key');
  }
  return found(project.key);
}

function selectValue(fields: JsonObject, fieldId: string) {
  const obj = objectAt(fields, fieldId);
  if (!obj) return fallbackTo(NOT_UPDATED);
  return text(obj.value, `fields.${fieldId}.value`, NOT_UPDATED);
}

/** Passed through untouched: no `.value` unwrap for this field. */
function rawValue(fields: JsonObject, fieldId: string): Extracted<JsonValue> {
  const v = fields[fieldId];
  if (absent(v)) return fallbackTo(NOT_UPDATED);
  return found(v);
}

/* ------------------ row assembly ------------------ */

type CheckedColumn = Exclude<keyof CompleteIssueRow, 'CAT Scope' | 'Comments'>;

const CHECKED_COLUMNS: readonly CheckedColumn[] = [
  'JIRA Key',
  'Summary',
  'Type',
  'Status',
  'Fix Version',
  'Project',
  'IT Portal/SR/CR',
];

const sentinelFor = (col: CheckedColumn) =>
  col === 'JIRA Key' ? UNKNOWN_KEY : NOT_UPDATED;

type ExtractedRow = {
  [C in Exclude<keyof CompleteIssueRow, 'Comments'>]: Extracted<
    CompleteIssueRow[C]
  >;
};

/**
 * One "Error: <column> is missing. " per checked column that fell back or
 * whose value is the sentinel itself. CAT Scope is not checked.
 */
function missingFieldComments(extracted: ExtractedRow): string {
  let comments = '';
  for (const col of CHECKED_COLUMNS) {
    const { value, defaulted } = extracted[col];
    if (defaulted || value === sentinelFor(col)) {
      comments += `Error: ${col} is missing. `;
    }
  }
  return comments;
}

function extractRow(
  raw: RawIssue,
  fieldIds: JiraFieldIds
): CompleteIssueRow {
  const fields = raw.fields;
  if (!isJsonObject(fields)) {
    throw new NormalizationError('issue has no fields object');
  }

  const x: ExtractedRow = {
    'JIRA Key': issueKey(raw),
    Summary: text(fields.summary, 'fields.summary', NOT_UPDATED),
    Type: nameOf(fields, 'issuetype'),
    Status: nameOf(fields, 'status'),
    'Fix Version': firstFixVersion(fields),
    Project: projectKey(fields),
    'CAT Scope': selectValue(fields, fieldIds.catScope),
    'IT Portal/SR/CR': rawValue(fields, fieldIds.itPortal),
  };

  return {
    'JIRA Key': x['JIRA Key'].value,
    Summary: x.Summary.value,
    Type: x.Type.value,
    Status: x.Status.value,
    'Fix Version': x['Fix Version'].value,
    Project: x.Project.value,
    'CAT Scope': x['CAT Scope'].value,
    'IT Portal/SR/CR': x['IT Portal/SR/CR'].value,
    Comments: missingFieldComments(x),
  };
}

export function describeError(err: unknown): string {
  if (err instanceof HttpError && err.errorMessages.length) {
    return err.errorMessages.join(', ');
  }
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Flatten one Jira issue into a dashboard row. Never throws: an issue that
 * cannot be read becomes a two-column row describing what went wrong.
 */
export function normalizeIssue(
  raw: RawIssue,
  fieldIds: JiraFieldIds = DEFAULT_FIELD_IDS
): IssueRow {
  try {
    return extractRow(raw, fieldIds);
  } catch (e) {
    const degraded: DegradedIssueRow = {
      'JIRA Key': UNKNOWN_KEY,
      Comments: `Error in normalization: ${describeError(e)}`,
    };
    return degraded;
  }
}
