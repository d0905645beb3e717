export type PromptParts = {
  goal: string;
  /** Rolling summary so far; empty before the first batch. */
  summary: string;
  /** Batch rendered one message per line. */
  messages: string;
};

export function buildPrompt(parts: PromptParts): string {
  return `You are summarizing a Telegram chat conversation.

User's goal for this summary:
${parts.goal}

Current summary so far:
${parts.summary}

New messages to incorporate:
${parts.messages}
Rules:
- Focus on information relevant to the user's goal
- Identify key topics and themes discussed
- Note important decisions or conclusions
- Highlight action items if any
- Keep the summary concise but comprehensive
- Write in the same language as the messages
- Output ONLY the updated summary as plain text (markdown allowed), no preamble

Updated summary:`;
}
