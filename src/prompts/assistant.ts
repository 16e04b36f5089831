/**
 * Assistant Prompts
 *
 * Used by the context assembler (`mailrecall ask`).
 */

/** Default system prompt; retrieved emails are appended after it. */
export const ASSISTANT_SYSTEM_PROMPT =
  "You are an AI assistant with access to the user's email collection. " +
  "Below are the emails retrieved as most relevant to the user's question. " +
  'Answer the question based on these emails. ' +
  'If the answer is not in the emails, say so politely. ' +
  'Answer in a conversational, helpful manner as a personal email assistant.';

/** Reply when the answer generator fails. */
export const ASSISTANT_GENERATION_APOLOGY =
  'I apologize, but there was an error reaching the language model. Please check the LLM configuration and try again.';

/** Reply when anything else goes wrong while answering. */
export const ASSISTANT_SYSTEM_APOLOGY =
  'I apologize, but I encountered a system error while processing your request.';

/** Reply when the model answers with nothing. */
export const ASSISTANT_EMPTY_REPLY = 'I apologize, but I received an empty response from the AI model.';
