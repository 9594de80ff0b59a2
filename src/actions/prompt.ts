/**
 * Action Grammar Prompts
 *
 * The markup contract the model is asked to follow, plus the requests used
 * when it answers in free prose instead.
 */

export const ACTION_MARKUP_EXAMPLE = `<actions>
  <action type="command">
    <description>What this command does</description>
    <command>the bash command</command>
  </action>

  <action type="file">
    <description>What this file is for</description>
    <path>relative/path/to/file</path>
    <content><![CDATA[
file content here
]]></content>
  </action>
</actions>`;

/**
 * Base instructions for the coding assistant. The action contract is
 * appended by `enhanceSystemPrompt()` when structured prompting is on.
 */
export function baseSystemPrompt(date: Date = new Date()): string {
  const today = date.toLocaleDateString('en-US', { year: 'numeric', month: 'long', day: 'numeric' });
  return `You are a helpful coding assistant running in a terminal. Today's date is ${today}.

Help with writing, reviewing, debugging and explaining code. Format code blocks with a language marker,
explain briefly before each block, and show complete file contents when a file should change.
The user reviews and confirms every command and file write before it runs.`;
}

export const STRUCTURED_ACTION_PROMPT = `When you need to create files or run commands on the user's system,
you MUST use the following structured format:

1. First, explain what you're going to do in plain text
2. Then output actions in this exact format:

<actions>
  <action type="command">
    <description>Create directory structure</description>
    <command>mkdir -p web/src web/public</command>
  </action>

  <action type="file">
    <description>Create package.json</description>
    <path>web/package.json</path>
    <content><![CDATA[
{
  "name": "web",
  "version": "0.1.0"
}
]]></content>
  </action>
</actions>

Rules:
- ALWAYS use this format when creating files or running commands
- Each action should be atomic (one file or one command)
- Use CDATA for file content to handle special characters
- Commands should be simple bash commands
- File paths must be relative to the current directory
- To replace an existing file use <action type="file" op="modify">

After outputting actions, wait for confirmation before proceeding to the next set.`;

export const REFORMAT_SYSTEM_PROMPT =
  'You are a helpful assistant that converts instructions into structured action markup.';

/** Upper bound on how much of the original answer is echoed back. */
export const REFORMAT_EXCERPT_CHARS = 2000;

/**
 * Append the action contract to a base system prompt.
 */
export function enhanceSystemPrompt(basePrompt: string): string {
  return `${basePrompt}\n\n${STRUCTURED_ACTION_PROMPT}`;
}

/**
 * Ask the model to restate a prose answer as `<actions>` markup.
 */
export function buildReformatPrompt(originalResponse: string): string {
  return `I need to execute the file creations and commands from your previous response.
Please convert your instructions into the structured format so I can execute them step by step.

Your previous response was:
---
${originalResponse.slice(0, REFORMAT_EXCERPT_CHARS)}
---

Please output ONLY the structured actions in this format, nothing else:

${ACTION_MARKUP_EXAMPLE}

Important:
- Include ALL files and commands from your previous response
- Use exact file paths and content
- Order actions logically (create directories before files)
- Each action should be atomic`;
}

/**
 * Hint shown to the user when a response looks like it wanted to act but
 * used no markup.
 */
export function suggestStructuredFormat(): string {
  return `The response seems to describe files or commands without the structured format.
Ask the model to reformat it like this:

${ACTION_MARKUP_EXAMPLE}

This allows each step to be executed with confirmation.`;
}
