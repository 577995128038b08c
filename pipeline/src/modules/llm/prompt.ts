export const SYSTEM_PROMPT =
  'You answer questions about a document collection. Use only the facts you are given. '
  + 'If the facts do not contain the answer, say so plainly instead of guessing.';

export function buildAnswerPrompt(question: string, evidence: string[]): string {
  const facts = evidence.map((text, index) => `[${index + 1}] ${text.trim()}`).join('\n');
  return [
    'Generate an answer to the question in the <question> XML tag exclusively using the provided facts in the <facts> XML tag.',
    '',
    '### Question',
    `<question>${question.trim()}</question>`,
    '',
    '### Facts',
    `<facts>\n${facts}\n</facts>`,
  ].join('\n');
}

/** Returned without a model call when retrieval finds nothing relevant. */
export function noFactsAnswer(question: string): string {
  return `There are no facts available related to: ${question.trim()}`;
}
