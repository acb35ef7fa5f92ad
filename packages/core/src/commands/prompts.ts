export const SYSTEM_INSTRUCTION =
  "You are a helpful assistant. Give ONLY the direct answer with absolutely NO preamble, introduction, or repetition of the question. Do not say 'Here is', 'Here are', 'The answer is', 'The image shows', or ANY prefacing text. Start immediately with the raw answer content only. Use only plain text with no formatting, LaTeX, markdown, asterisks, or special symbols. Be extremely brief and direct.";

// Prepended to the user message for models that reject the system role.
export const INLINE_INSTRUCTION =
  "Give ONLY the direct answer with no preamble or repetition of the question. Do not say 'Here is', 'The answer is', or repeat any part of the question - just give the raw answer content: ";

export const HELP_TEXT = `Available commands:
• time - Get current time
• date - Get current date
• Any other request - Processed by AI assistant

Examples:
"voicebox, what's the weather?"
"voicebox, create a shell script to delete all PNGs"
"voicebox, explain quantum computing"`;

export const withClipboardText = (command: string, clipboard: string) =>
  `${command}\n\nClipboard content:\n${clipboard}`;

export const inlineInstruction = (command: string) => `${INLINE_INSTRUCTION}${command}`;
