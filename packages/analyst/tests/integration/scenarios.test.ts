import { describe, it, expect, vi, afterEach } from 'vitest';
import { RequestTimeoutError } from '@pitchside/llm';
import type { LLMRequest, LLMResponse, ProviderAdapter } from '@pitchside/llm';
import { createAnalyst } from '../../src/app.js';
import type { AnalystConfig } from '../../src/config/index.js';
import { FAILURE_MESSAGES } from '../../src/orchestrator/index.js';
import { loadJsonTeamStore } from '../../src/store/index.js';
import { BUNDLED_DATA_PATH } from '../../src/app.js';
import { makeNoopLogger } from '../../src/observability/logger.js';
import { lastToolResult, textResponse, toolCallResponse, userQuery } from './helpers.js';

const config: AnalystConfig = {
  llm: {
    provider: 'openai',
    apiKey: 'test-secret',
    baseUrl: 'http://model.test',
    model: 'gpt-4o-mini',
    timeoutMs: 1000,
    maxRetries: 0,
  },
  store: { url: null, apiKey: null, dataPath: null, timeoutMs: 1000 },
  catalogPath: null,
  log: { level: 'silent', serviceName: 'pitchside-test' },
};

type PlannedCall = {
  readonly name: string;
  readonly args: Record<string, unknown>;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Writes the answer the way a model would: only from the function result.
function summarise(result: unknown): string {
  if (!isRecord(result)) {
    return '';
  }
  if (result['status'] === 'not_found') {
    return `There is no data for ${String(result['identifier'])}.`;
  }
  const data = result['data'];
  if (!isRecord(data) || !isRecord(data['goal_stats']) || !Array.isArray(data['weaknesses'])) {
    return '';
  }
  return `${String(data['team'])} have scored ${String(data['goal_stats']['scored'])} goals `
    + `and conceded ${String(data['goal_stats']['conceded'])}. `
    + `Weaknesses: ${data['weaknesses'].join(', ')}.`;
}

/**
 * Stand-in model: picks the planned call for the user's query, then
 * summarises whatever the function returned.
 */
function plannedModel(plans: Readonly<Record<string, PlannedCall>>) {
  let calls = 0;
  return {
    name: 'fake',
    complete: vi.fn(async (request: LLMRequest): Promise<LLMResponse> => {
      calls++;
      if (request.toolChoice?.mode === 'none') {
        return textResponse(summarise(lastToolResult(request)));
      }
      const plan = plans[userQuery(request)];
      if (!plan) {
        return textResponse('I can only answer questions about teams.');
      }
      return toolCallResponse(plan.name, plan.args, `call_${calls}`);
    }),
  } satisfies ProviderAdapter;
}

const PLANS: Readonly<Record<string, PlannedCall>> = {
  'What are the main strengths and weaknesses of Lansdowne?': {
    name: 'get_team_insights',
    args: { team_name: 'Lansdowne' },
  },
  'How good is Nonexistent FC?': {
    name: 'get_team_insights',
    args: { team_name: 'Nonexistent FC' },
  },
  'Show me the player ratings for Lansdowne': {
    name: 'get_player_ratings',
    args: { team_name: 'Lansdowne' },
  },
  'Give me a SWOT analysis': {
    name: 'get_swot_analysis',
    args: {},
  },
};

async function analystWithSpiedStore(adapter: ProviderAdapter) {
  const store = await loadJsonTeamStore(BUNDLED_DATA_PATH);
  const spies = [
    vi.spyOn(store, 'findTeam'),
    vi.spyOn(store, 'findLeague'),
    vi.spyOn(store, 'findMatches'),
  ];
  const analyst = await createAnalyst(config, { adapter, store, logger: makeNoopLogger() });
  const storeCalls = () => spies.reduce((total, spy) => total + spy.mock.calls.length, 0);
  return { analyst, storeCalls };
}

describe('analyst scenarios', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('answers a team insights question from the stored record', async () => {
    const model = plannedModel(PLANS);
    const { analyst } = await analystWithSpiedStore(model);

    const outcome = await analyst.run('What are the main strengths and weaknesses of Lansdowne?');

    expect(outcome.dispatches.map((d) => d.call)).toEqual([
      { name: 'get_team_insights', args: { team_name: 'Lansdowne' }, callId: 'call_1' },
    ]);
    expect(outcome.state).toEqual({
      kind: 'DONE',
      answer: 'Lansdowne have scored 65 goals and conceded 26. '
        + 'Weaknesses: Weak on set pieces, Thin bench at full-back.',
    });
    expect(outcome.trace).toEqual([
      'DRAFTING',
      'AWAITING_FUNCTION_DECISION',
      'DISPATCHING',
      'SUMMARIZING',
      'DONE',
    ]);
  });

  it('says there is no data for an unknown team', async () => {
    const { analyst } = await analystWithSpiedStore(plannedModel(PLANS));

    const outcome = await analyst.run('How good is Nonexistent FC?');

    expect(outcome.dispatches[0]?.result).toEqual({
      status: 'not_found',
      entity: 'team',
      identifier: 'Nonexistent FC',
    });
    expect(outcome.state).toEqual({ kind: 'DONE', answer: 'There is no data for Nonexistent FC.' });
  });

  it('never reaches the store for an unregistered function', async () => {
    const { analyst, storeCalls } = await analystWithSpiedStore(plannedModel(PLANS));

    const outcome = await analyst.run('Show me the player ratings for Lansdowne');

    expect(outcome.state).toMatchObject({ kind: 'FAILED', errorKind: 'UnknownFunctionError' });
    expect(outcome.dispatches.map((d) => d.errorKind)).toEqual(['UnknownFunctionError', 'UnknownFunctionError']);
    expect(storeCalls()).toBe(0);
  });

  it('never reaches the store when a required argument is missing', async () => {
    const { analyst, storeCalls } = await analystWithSpiedStore(plannedModel(PLANS));

    const outcome = await analyst.run('Give me a SWOT analysis');

    expect(outcome.state).toMatchObject({ kind: 'FAILED', errorKind: 'InvalidArgumentError' });
    expect(outcome.state.kind === 'FAILED' && outcome.state.error).toMatchObject({ parameter: 'team_name' });
    expect(storeCalls()).toBe(0);
  });

  it('gives the same dispatch and data for the same query twice', async () => {
    const { analyst } = await analystWithSpiedStore(plannedModel(PLANS));
    const query = 'What are the main strengths and weaknesses of Lansdowne?';

    const first = await analyst.run(query);
    const second = await analyst.run(query);

    expect(second.dispatches.map((d) => d.call.name)).toEqual(first.dispatches.map((d) => d.call.name));
    expect(second.dispatches.map((d) => d.call.args)).toEqual(first.dispatches.map((d) => d.call.args));
    expect(second.dispatches[0]?.result).toEqual(first.dispatches[0]?.result);
    expect(second.queryId).not.toBe(first.queryId);
  });

  it('fails with a clean message when the model times out', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(
        (_input: string | URL | Request, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => {
              const error = new Error('The operation was aborted');
              error.name = 'AbortError';
              reject(error);
            });
          }),
      ),
    );
    const analyst = await createAnalyst(
      { ...config, llm: { ...config.llm, timeoutMs: 20 } },
      { logger: makeNoopLogger() },
    );

    const outcome = await analyst.run('What are the main strengths and weaknesses of Lansdowne?');

    expect(outcome.state).toMatchObject({
      kind: 'FAILED',
      errorKind: 'ModelUnavailableError',
      message: FAILURE_MESSAGES.ModelUnavailableError,
    });
    expect(outcome.state.kind === 'FAILED' && outcome.state.error.cause).toBeInstanceOf(RequestTimeoutError);
    expect(outcome.state.kind === 'FAILED' && outcome.state.message).not.toContain('timed out');
    expect(vi.mocked(globalThis.fetch).mock.calls[0]?.[0]).toBe('http://model.test/v1/chat/completions');
  });
});
