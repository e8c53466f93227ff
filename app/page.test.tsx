// @vitest-environment jsdom
import { cleanup, fireEvent, render, screen, waitFor } from '@testing-library/react';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { RawIssue, Selection } from '../types';
import { HttpError } from './api/jira/jiraClient';
import { buildDashboard, parseSelection } from './dashboardModel';
import Page from './page';

const issue: RawIssue = {
  key: 'OPS-1',
  fields: {
    summary: 'Rotate logs',
    issuetype: { name: 'Story' },
    status: { name: 'Done' },
    fixVersions: [{ name: '1.0' }],
    project: { key: 'OPS' },
  },
};

let posted: Selection[];
let failSearch: boolean;

// answers the way the dashboard route does, against an in-memory Jira
async function answer(selection: Selection) {
  try {
    const view = await buildDashboard(selection, {
      listProjects: async () => ({ OPS: 'Ops' }),
      listVersionOptions: async () => ['1.0'],
      search: async () => {
        if (failSearch) throw new HttpError(400, ['bad jql']);
        return [issue];
      },
    });
    return { ok: true, status: 200, body: view };
  } catch (e) {
    if (!(e instanceof HttpError)) throw e;
    return {
      ok: false,
      status: 502,
      body: { upstreamStatus: e.status, upstream: { errorMessages: e.errorMessages } },
    };
  }
}

function pick(select: HTMLElement, values: string[]) {
  if (!(select instanceof HTMLSelectElement)) throw new Error('expected a select');
  for (const o of Array.from(select.options)) o.selected = values.includes(o.value);
  fireEvent.change(select);
}

function optionCount(label: string) {
  const select = screen.getByLabelText(label);
  return select instanceof HTMLSelectElement ? select.options.length : -1;
}

beforeEach(() => {
  posted = [];
  failSearch = false;
  vi.stubGlobal(
    'fetch',
    vi.fn(async (_url: string, init?: RequestInit) => {
      const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : null;
      const selection = parseSelection(body);
      posted.push(selection);
      const res = await answer(selection);
      return { ok: res.ok, status: res.status, json: async () => res.body };
    })
  );
});

afterEach(() => {
  cleanup();
  vi.unstubAllGlobals();
});

describe('Page', () => {
  it('keeps the pickers usable after an upstream failure', async () => {
    failSearch = true;
    render(<Page />);

    await screen.findByRole('option', { name: 'OPS — Ops' });
    pick(screen.getByLabelText('Select Project'), ['OPS']);
    await screen.findByRole('option', { name: '1.0' });
    pick(screen.getByLabelText('Select Fix Versions'), ['1.0']);

    const alert = await screen.findByRole('alert');
    expect(alert.textContent).toBe('bad jql');
    expect(optionCount('Select Project')).toBe(1);
    expect(optionCount('Select Fix Versions')).toBe(1);
    expect(optionCount('Select Insights')).toBe(6);

    pick(screen.getByLabelText('Select Fix Versions'), []);
    await screen.findByText('Please select at least one fix version.');
    expect(screen.queryByRole('alert')).toBeNull();
  });

  it('drops fix versions the server no longer offers', async () => {
    render(<Page />);

    await screen.findByRole('option', { name: 'OPS — Ops' });
    pick(screen.getByLabelText('Select Project'), ['OPS']);
    await screen.findByRole('option', { name: '1.0' });
    pick(screen.getByLabelText('Select Fix Versions'), ['1.0']);
    await screen.findByText('Data Summary:');

    pick(screen.getByLabelText('Select Project'), []);
    await screen.findByText('Please select at least one project.');
    expect(optionCount('Select Fix Versions')).toBe(0);

    pick(screen.getByLabelText('Select Project'), ['OPS']);
    await screen.findByText('Please select at least one fix version.');
    expect(posted[posted.length - 1]).toEqual({
      projects: ['OPS'],
      versions: [],
      insights: ['Issue Distribution by Type'],
    });
    await waitFor(() => {
      const version = screen.getByRole('option', { name: '1.0' });
      expect(version instanceof HTMLOptionElement && version.selected).toBe(false);
    });
  });
});
