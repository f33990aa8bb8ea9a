import type { AttributeDefinitionInput } from './types.js';

/**
 * Starter categories, modelled on how a personal secretary files what they
 * learn about the person they support.
 */
export const DEFAULT_ATTRIBUTE_DEFINITIONS: readonly AttributeDefinitionInput[] = [
  {
    name: 'User Profile',
    extractionPrompt:
      'Extract user profile information from the text, including occupation, position, and personal details. Example: I am an engineer → engineer',
    judgmentPrompt:
      "Does answering the following text require information about the user's profile, occupation, or personal details? Answer with 'yes' or 'no'.",
  },
  {
    name: 'Current Tasks & Projects',
    extractionPrompt:
      'Extract information about current tasks, projects, schedules, or goals from the text. Example: Meeting next Monday → Next Monday: Meeting',
    judgmentPrompt:
      "Does answering the following text require information about the user's current tasks, projects, or schedules? Answer with 'yes' or 'no'.",
  },
  {
    name: 'Expertise & Skills',
    extractionPrompt:
      "Extract information about user's expertise, skills, or areas of interest from the text. Example: I often go hiking on weekends → hiking",
    judgmentPrompt:
      "Does answering the following text require information about the user's expertise, skills, or interests? Answer with 'yes' or 'no'.",
  },
  {
    name: 'Past Decisions & Policies',
    extractionPrompt:
      "Extract information about user's past decisions, preferences, or policies from the text. Example: I prefer tea over coffee → prefers tea",
    judgmentPrompt:
      "Does answering the following text require information about the user's past decisions, preferences, or policies? Answer with 'yes' or 'no'.",
  },
];
