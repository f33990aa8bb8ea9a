/**
 * Attribute Extraction Prompt
 */

export function buildExtractionPrompt(instruction: string, input: string, sentinel = 'none'): string {
  return `You are an assistant that extracts information.

<Extraction Instructions>
${instruction}
</Extraction Instructions>

<User Input>
${input}
</User Input>

If there is no information to extract, please respond with '${sentinel}'.
Extracted content:`;
}
