import { generateObject } from 'ai';
import { z } from 'zod';

import type { JudgeVerdict, LogSink } from '../types.js';
import type { LanguageModel } from 'ai';

import { errorMessage } from '../utils.js';

const JudgeSchema = z.object({
  relevance: z.number(),
  accuracy: z.number(),
  completeness: z.number(),
  verdict: z.enum(['pass', 'warn', 'retry']),
  feedback: z.string(),
});

const JUDGE_SYSTEM_PROMPT = `You evaluate one complete turn of a data analysis assistant.

Score each dimension from 0 to 10:
- relevance: did the turn address the user's question?
- accuracy: are numbers and claims grounded in the query results? Derived figures (totals, averages, percentages) computed from the data count as accurate.
- completeness: was the question fully answered, with a chart where one was warranted?

Verdict: "pass" when every score is 7 or more, "warn" when any score is 5 or 6, "retry" when any score is below 5.
Feedback: one or two sentences on what to fix.`;

const MAX_RESULT_CHARS = 500;

export interface TurnTranscript {
  question: string;
  messages: readonly string[];
  queryResults: readonly string[];
  plots: readonly string[];
}

export interface LLMJudgeOptions {
  model: LanguageModel;
  log?: LogSink;
  abortSignal?: AbortSignal;
}

const clampScore = (value: number): number => Math.max(0, Math.min(10, Math.round(value)));

const neutralVerdict = (reason: string): JudgeVerdict => ({
  relevance: 5,
  accuracy: 5,
  completeness: 5,
  verdict: 'pass',
  feedback: `Judge evaluation failed: ${reason}`,
});

export function buildJudgePrompt(turn: TurnTranscript): string {
  const messages = turn.messages.length > 0 ? turn.messages.join('\n---\n') : 'No messages sent.';
  const results = turn.queryResults.length > 0
    ? turn.queryResults.map((r) => r.slice(0, MAX_RESULT_CHARS)).join('\n---\n')
    : 'No queries executed.';
  const plots = turn.plots.length > 0 ? turn.plots.join(', ') : 'No plots created.';
  return [
    '## User Question', turn.question, '',
    '## Messages Sent to User', messages, '',
    '## Query Results', results, '',
    '## Plots Created', plots, '',
    'Evaluate the overall quality of this turn.',
  ].join('\n');
}

/**
 * Secondary-model review of a finished turn. Failures degrade to a neutral
 * `pass` so the judge can never break a run.
 */
export class LLMJudge {
  private readonly model: LanguageModel;
  private readonly log?: LogSink;
  private readonly abortSignal?: AbortSignal;

  constructor(opts: LLMJudgeOptions) {
    this.model = opts.model;
    this.log = opts.log;
    this.abortSignal = opts.abortSignal;
  }

  async evaluateTurn(turn: TurnTranscript): Promise<JudgeVerdict> {
    try {
      const { object } = await generateObject({
        model: this.model,
        schema: JudgeSchema,
        system: JUDGE_SYSTEM_PROMPT,
        prompt: buildJudgePrompt(turn),
        abortSignal: this.abortSignal,
      });
      return {
        relevance: clampScore(object.relevance),
        accuracy: clampScore(object.accuracy),
        completeness: clampScore(object.completeness),
        verdict: object.verdict,
        feedback: object.feedback,
      };
    } catch (error) {
      const reason = errorMessage(error);
      this.log?.({
        timestamp: Date.now(),
        severity: 'WRN',
        iteration: 0,
        invocation: 0,
        direction: 'response',
        type: 'llm',
        remoteIdentifier: 'judge',
        fatal: false,
        message: `judge evaluation failed: ${reason}`,
      });
      return neutralVerdict(reason);
    }
  }
}
