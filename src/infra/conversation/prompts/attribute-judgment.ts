/**
 * Attribute Judgment Prompt
 */

export function buildJudgmentPrompt(question: string, input: string): string {
  return `You are an assistant that makes judgments.
Please answer the following question with only 'yes' or 'no'.

<Judgment Question>
${question}
</Judgment Question>

<User Input>
${input}
</User Input>

Answer (only 'yes' or 'no'):`;
}
