const LONG_ANSWER_COMMAND = "/answer";
const SHORT_ANSWER_COMMAND = "/a";

export function renderPrompt(question: string, options: readonly string[]): string {
  const lines = [`Summary: ${question}`];
  if (options.length > 0) {
    lines.push("Options:");
    options.forEach((option, index) => {
      lines.push(`${index + 1}) ${option}`);
    });
  }
  lines.push("Reply with plain text.");
  return lines.join("\n");
}

export function buildQuestionSummary(input: {
  question: string;
  lastStatus?: string | undefined;
  timeoutSeconds?: number | undefined;
}): string {
  const parts = [`Last status: ${input.lastStatus || "none"}`, `Prompt: ${input.question}`];
  if (input.timeoutSeconds !== undefined) {
    parts.push(`Timeout: ${input.timeoutSeconds}s`);
  }
  return parts.join(" | ");
}

// "/answer" strips as a bare prefix; "/a" only as a word, so "/abort" stays text
function stripAnswerCommand(text: string): string {
  const lowered = text.toLowerCase();
  if (lowered.startsWith(LONG_ANSWER_COMMAND)) {
    return text.slice(LONG_ANSWER_COMMAND.length).trim();
  }
  if (lowered === SHORT_ANSWER_COMMAND || lowered.startsWith(`${SHORT_ANSWER_COMMAND} `)) {
    return text.slice(SHORT_ANSWER_COMMAND.length).trim();
  }
  return text;
}

/**
 * Maps an operator reply onto the offered options. A bare 1-based index picks
 * the option; any other text is taken verbatim. Returns undefined for an empty reply.
 */
export function parseAnswer(text: string, options: readonly string[]): string | undefined {
  const cleaned = stripAnswerCommand(text.trim());
  if (!cleaned) {
    return undefined;
  }
  if (/^\d+$/.test(cleaned)) {
    const option = options[Number.parseInt(cleaned, 10) - 1];
    if (option !== undefined) {
      return option;
    }
  }
  return cleaned;
}
