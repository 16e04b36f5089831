/**
 * Mail Prompts
 *
 * Used by the ingestion pipeline to summarize each message before it is
 * embedded. The summary block format is shared with formatFallbackSummary().
 */

export const EMAIL_SUMMARY_SYSTEM = `Summarize the given email in the following format. Keep it brief without losing important information.

OUTPUT FORMAT:
<Email Start>
Date and Time: (format: dd-MMM-yyyy HH h:mmtt [with time zone])
Sender:
CC:
Subject:
Email Context:
<Email End>`;

export const EMAIL_SUMMARY_PROMPT = `The email is the following:

date and time: {date}
from: {sender}
cc: {cc}
subject: {subject}
body: {body}

Summarize this email according to the format above.`;
