export interface ParsedAssistantResponse {
  /** Response text with every fenced block replaced by "[CODE BLOCK]" */
  mainText: string;
  /** Bodies of fenced code blocks, in order */
  codeBlocks: string[];
  /** The response mentions a function or tool call */
  containsFunctionCall: boolean;
}

const CODE_BLOCK = /```(?:\w+)?\s*\n([\s\S]*?)\n```/g;

/** Split an assistant reply captured from the terminal into text and code. */
export function parseAssistantResponse(response: string): ParsedAssistantResponse {
  const codeBlocks = Array.from(response.matchAll(CODE_BLOCK), (match) => match[1]);
  return {
    mainText: response.replace(CODE_BLOCK, '[CODE BLOCK]'),
    codeBlocks,
    containsFunctionCall: response.includes('function_call') || response.includes('tool_call'),
  };
}
