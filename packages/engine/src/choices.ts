import type { ChoiceRequest } from '@pocket-horde/shared';
import type { ChoiceProvider } from './types';

export class ChoicesExhaustedError extends Error {
  constructor(readonly request: ChoiceRequest) {
    super(`no scripted answer left for ${request.kind}`);
    this.name = 'ChoicesExhaustedError';
  }
}

/**
 * Answers choices from a queue. When the queue runs dry the fallback answers, or,
 * without one, the request fails with {@link ChoicesExhaustedError}.
 */
export class ScriptedChoiceProvider implements ChoiceProvider {
  private readonly answers: string[];
  readonly asked: ChoiceRequest[] = [];

  constructor(answers: readonly string[] = [], private readonly fallback?: ChoiceProvider) {
    this.answers = [...answers];
  }

  get pending(): number {
    return this.answers.length;
  }

  enqueue(...answers: string[]): void {
    this.answers.push(...answers);
  }

  clear(): void {
    this.answers.length = 0;
  }

  choose(request: ChoiceRequest): string {
    this.asked.push(request);
    const next = this.answers.shift();
    if (next !== undefined) {
      return next;
    }
    if (this.fallback) {
      return this.fallback.choose(request);
    }
    throw new ChoicesExhaustedError(request);
  }
}

export const matchOption = <T extends string>(answer: string, options: readonly T[]): T | undefined => {
  const normalized = answer.trim().toUpperCase();
  return options.find((option) => option.toUpperCase() === normalized);
};
