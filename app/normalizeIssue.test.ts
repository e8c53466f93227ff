import { describe, expect, it } from 'vitest';
import type { JsonObject, RawIssue } from '../types';
import { HttpError } from './api/jira/jiraClient';
import { describeError, normalizeIssue } from './normalizeIssue';

function makeFields(overrides: JsonObject = {}): JsonObject {
  return {
    summary: 'Checkout button misaligned',
    issuetype: { name: 'Defect' },
    status: { name: 'In Progress' },
    fixVersions: [{ name: '1.0' }],
    project: { key: 'OPS', name: 'Ops' },
    customfield_10079: { value: 'In scope' },
    customfield_10065: 'SR-1001',
    ...overrides,
  };
}

function makeIssue(fields: JsonObject = makeFields()): RawIssue {
  return { key: 'OPS-1', fields };
}

function without(name: string): JsonObject {
  const fields = makeFields();
  delete fields[name];
  return fields;
}

describe('normalizeIssue', () => {
  it('maps a fully populated issue with empty comments', () => {
    expect(normalizeIssue(makeIssue())).toEqual({
      'JIRA Key': 'OPS-1',
      Summary: 'Checkout button misaligned',
      Type: 'Defect',
      Status: 'In Progress',
      'Fix Version': '1.0',
      Project: 'OPS',
      'CAT Scope': 'In scope',
      'IT Portal/SR/CR': 'SR-1001',
      Comments: '',
    });
  });

  it.each([
    ['summary', 'Summary'],
    ['issuetype', 'Type'],
    ['status', 'Status'],
    ['fixVersions', 'Fix Version'],
    ['project', 'Project'],
    ['customfield_10065', 'IT Portal/SR/CR'],
  ] as const)('falls back when %s is missing', (field, column) => {
    const row = normalizeIssue(makeIssue(without(field)));
    expect(row).toHaveProperty([column], 'Not updated');
    expect(row.Comments).toBe(`Error: ${column} is missing. `);
  });

  it('treats null like a missing field', () => {
    const row = normalizeIssue(makeIssue(makeFields({ status: null })));
    expect(row).toHaveProperty(['Status'], 'Not updated');
    expect(row.Comments).toBe('Error: Status is missing. ');
  });

  it('uses Unknown when the issue key is missing', () => {
    const row = normalizeIssue({ fields: makeFields() });
    expect(row['JIRA Key']).toBe('Unknown');
    expect(row.Comments).toBe('Error: JIRA Key is missing. ');
  });

  it('treats an empty fix version list as missing', () => {
    const row = normalizeIssue(makeIssue(makeFields({ fixVersions: [] })));
    expect(row).toHaveProperty(['Fix Version'], 'Not updated');
    expect(row.Comments).toBe('Error: Fix Version is missing. ');
  });

  it('reports only the first fix version', () => {
    const row = normalizeIssue(
      makeIssue(makeFields({ fixVersions: [{ name: '2.0' }, { name: '1.0' }] }))
    );
    expect(row).toHaveProperty(['Fix Version'], '2.0');
  });

  it('does not comment on a missing CAT Scope', () => {
    const row = normalizeIssue(makeIssue(without('customfield_10079')));
    expect(row).toHaveProperty(['CAT Scope'], 'Not updated');
    expect(row.Comments).toBe('');
  });

  it('falls back when the CAT Scope option has no value', () => {
    const row = normalizeIssue(
      makeIssue(makeFields({ customfield_10079: { id: '10001' } }))
    );
    expect(row).toHaveProperty(['CAT Scope'], 'Not updated');
  });

  it('passes the IT Portal field through without unwrapping', () => {
    const option = { value: 'CR-77', id: '10020' };
    const row = normalizeIssue(
      makeIssue(makeFields({ customfield_10065: option }))
    );
    expect(row).toHaveProperty(['IT Portal/SR/CR'], option);
    expect(row.Comments).toBe('');
  });

  it('appends comments in column order', () => {
    const fields = makeFields({ summary: null, fixVersions: [] });
    delete fields.issuetype;
    delete fields.customfield_10065;
    const row = normalizeIssue({ fields });
    expect(row.Comments).toBe(
      'Error: JIRA Key is missing. ' +
        'Error: Summary is missing. ' +
        'Error: Type is missing. ' +
        'Error: Fix Version is missing. ' +
        'Error: IT Portal/SR/CR is missing. '
    );
  });

  it('flags a real value that equals the sentinel', () => {
    const row = normalizeIssue(
      makeIssue(makeFields({ status: { name: 'Not updated' } }))
    );
    expect(row.Comments).toBe('Error: Status is missing. ');
  });

  it('reads custom fields from the configured ids', () => {
    const row = normalizeIssue(
      makeIssue(
        makeFields({
          customfield_20000: { value: 'Out of scope' },
          customfield_20001: 'SR-9',
        })
      ),
      { catScope: 'customfield_20000', itPortal: 'customfield_20001' }
    );
    expect(row).toHaveProperty(['CAT Scope'], 'Out of scope');
    expect(row).toHaveProperty(['IT Portal/SR/CR'], 'SR-9');
  });

  describe('malformed issues', () => {
    it('degrades a row whose project is not an object', () => {
      expect(normalizeIssue(makeIssue(makeFields({ project: 'OPS' })))).toEqual({
        'JIRA Key': 'Unknown',
        Comments: 'Error in normalization: fields.project is not an object',
      });
    });

    it('degrades a row whose project has no key', () => {
      expect(
        normalizeIssue(makeIssue(makeFields({ project: { name: 'Ops' } })))
      ).toEqual({
        'JIRA Key': 'Unknown',
        Comments: 'Error in normalization: fields.project has no key',
      });
    });

    it('degrades a row without a fields object', () => {
      expect(normalizeIssue({ key: 'OPS-9' })).toEqual({
        'JIRA Key': 'Unknown',
        Comments: 'Error in normalization: issue has no fields object',
      });
    });

    it('degrades a row whose fix versions are not a list', () => {
      expect(
        normalizeIssue(makeIssue(makeFields({ fixVersions: '1.0' })))
      ).toEqual({
        'JIRA Key': 'Unknown',
        Comments: 'Error in normalization: fields.fixVersions is not a list',
      });
    });

    it('degrades a row whose summary is not text', () => {
      expect(normalizeIssue(makeIssue(makeFields({ summary: 42 })))).toEqual({
        'JIRA Key': 'Unknown',
        Comments: 'Error in normalization: fields.summary is not a string',
      });
    });
  });
});

describe('describeError', () => {
  it('joins upstream error messages', () => {
    expect(describeError(new HttpError(400, ['bad jql', 'no such field']))).toBe(
      'bad jql, no such field'
    );
  });

  it('falls back to the error message', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError(new HttpError(503))).toBe('Jira returned HTTP 503');
  });

  it('stringifies non-errors', () => {
    expect(describeError('plain')).toBe('plain');
  });
});
