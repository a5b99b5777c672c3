/**
 * Summary Level Prompt Templates
 *
 * Instruction text placed ahead of every request. Contextual templates refer to
 * the [PREVIOUS_SUMMARY] and [CURRENT_CHUNK] labels the request builder emits.
 */

const SHARED_RULES =
  'Do not repeat the section labels, keep paragraph breaks for readability, ' +
  "avoid phrases like 'in conclusion' or 'in summary', and never mention chunks.";

export const LEVEL_PROMPTS = {
  verbose:
    'Write a detailed summary that folds the new material in [CURRENT_CHUNK] into the ' +
    'running summary in [PREVIOUS_SUMMARY]. Emphasize key details, decisions, action items ' +
    'and stated goals, and list any questions raised that still need follow-up. ' +
    SHARED_RULES,

  concise:
    'Write a concise summary of [CURRENT_CHUNK] that continues [PREVIOUS_SUMMARY]. Keep the ' +
    'key details and important points, and collect open questions that need follow-up. ' +
    SHARED_RULES,

  terse:
    'Write a terse executive summary of [CURRENT_CHUNK] that continues [PREVIOUS_SUMMARY], ' +
    'limited to key decisions and technical content someone must act on. ' +
    SHARED_RULES,

  simple:
    'Explain [CURRENT_CHUNK] in plain, simple language for a reader with no background, ' +
    'continuing the explanation already given in [PREVIOUS_SUMMARY]. ' +
    SHARED_RULES,

  transcribe:
    'Rewrite the following transcript as a dialogue, like a script in a novel. Remove filler ' +
    "words such as 'uh' and 'umm' and lightly edit sentences for clarity, but keep every " +
    'detail of the conversation. Do not summarize or omit anything. Keep paragraph breaks ' +
    'for readability.',
} as const;
