import { ChatTurn } from '../types';

export const NO_HISTORY = 'No previous conversation.';
export const MAX_HISTORY_TURNS = 10;

/** Renders the most recent `maxTurns` turns as User/Assistant lines. */
export function formatChatHistory(history: readonly ChatTurn[], maxTurns = MAX_HISTORY_TURNS): string {
  const recent = history.slice(-Math.max(1, maxTurns));
  if (recent.length === 0) {
    return NO_HISTORY;
  }

  const lines: string[] = [];
  for (const turn of recent) {
    if (turn.question) {
      lines.push(`User: ${turn.question}`);
    }
    if (turn.answer) {
      lines.push(`Assistant: ${turn.answer}`);
    }
  }

  return lines.length > 0 ? lines.join('\n') : NO_HISTORY;
}

/**
 * Most recent turn that has both a question and an answer.
 */
export function lastInteraction(history: readonly ChatTurn[]): ChatTurn | undefined {
  for (let i = history.length - 1; i >= 0; i--) {
    const question = history[i].question.trim();
    const answer = history[i].answer.trim();
    if (question && answer) {
      return { question, answer };
    }
  }
  return undefined;
}

/**
 * Strip markdown code fences from model output.
 */
export function stripCodeFences(text: string): string {
  return text
    .replace(/```[a-zA-Z]*\n?/g, '')
    .replace(/```/g, '')
    .trim();
}
