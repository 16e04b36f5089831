/**
 * Centralized Prompt Registry
 *
 * All prompts used in mailrecall are exported from this module.
 *
 * Naming convention:
 *   *_SYSTEM: stable instructions (cached by LLM providers)
 *   *_PROMPT: user template with {placeholders} for dynamic content
 */

// Summarization prompts (ingestion)
export { EMAIL_SUMMARY_SYSTEM, EMAIL_SUMMARY_PROMPT } from './mail.js';

// Assistant prompts (ask)
export {
  ASSISTANT_SYSTEM_PROMPT,
  ASSISTANT_GENERATION_APOLOGY,
  ASSISTANT_SYSTEM_APOLOGY,
  ASSISTANT_EMPTY_REPLY,
} from './assistant.js';

/**
 * Replace `{name}` placeholders. Values are inserted literally (no `$`
 * replacement patterns).
 */
export function fillPrompt(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) =>
    Object.prototype.hasOwnProperty.call(values, name) ? values[name] : match
  );
}
