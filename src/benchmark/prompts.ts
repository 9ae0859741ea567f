/**
 * Prompt templates for answer generation and grading
 */

export const RESPONSE_SYSTEM_PROMPT = `You are a helpful expert assistant answering questions about a user's past conversations, using only the context provided.`;

export function buildResponsePrompt(context: string, question: string): string {
  return `You have access to facts and entities recalled from earlier conversations.

# INSTRUCTIONS:
1. Read every fact and entity in the context before answering.
2. Each timestamp marks when the described event happened, not when it was mentioned.
3. Look for direct evidence of the specific event or fact the question asks about.
4. When memories contradict each other, prefer the most recent one.
5. Turn relative time references ("last week", "yesterday") into concrete dates using the timestamps.
6. Name the specific people, places and events involved.
7. Keep the final answer short and precise.

Example:
Memory: (2023-03-15T16:33:00Z) I went to the vet yesterday.
Question: What day did I go to the vet?
Answer: March 15, 2023

# CONTEXT:
${context}

# QUESTION:
${question}

Answer:`;
}

export const GRADER_SYSTEM_PROMPT = `You are an expert grader who decides whether a generated answer matches a gold-standard answer. Reply with a JSON object only.`;

const GRADING_OUTPUT_INSTRUCTIONS = `Respond with a JSON object of the form:
{"reasoning": "<one sentence>", "verdict": "CORRECT" | "WRONG"}`;

type GradingRubric = (question: string, goldAnswer: string, response: string) => string;

const defaultRubric: GradingRubric = (question, goldAnswer, response) => `Label the generated answer to the question below as CORRECT or WRONG.

The gold answer is usually short. The generated answer may be longer; be generous. If it addresses the same topic and agrees with the gold answer, it is CORRECT.
For time questions, the generated answer is CORRECT when it refers to the same date or period as the gold answer, whatever the format ("May 7th" and "7 May" are the same date).

Question: ${question}
Gold answer: ${goldAnswer}
Generated answer: ${response}

${GRADING_OUTPUT_INSTRUCTIONS}`;

const GRADING_RUBRICS: Record<string, GradingRubric> = {
  'temporal-reasoning': (question, goldAnswer, response) => `Label the response CORRECT if it contains the correct answer, or all the intermediate steps needed to reach it; otherwise WRONG. A response holding only part of the required information is WRONG. Do not penalize off-by-one errors when counting days, weeks or months (19 days against a gold answer of 18 is still CORRECT).

<QUESTION>
${question}
</QUESTION>
<CORRECT ANSWER>
${goldAnswer}
</CORRECT ANSWER>
<RESPONSE>
${response}
</RESPONSE>

${GRADING_OUTPUT_INSTRUCTIONS}`,

  'knowledge-update': (question, goldAnswer, response) => `Label the response CORRECT if it contains the correct answer; otherwise WRONG. A response that mentions earlier information together with the updated answer is CORRECT as long as the updated answer is the required one.

<QUESTION>
${question}
</QUESTION>
<CORRECT ANSWER>
${goldAnswer}
</CORRECT ANSWER>
<RESPONSE>
${response}
</RESPONSE>

${GRADING_OUTPUT_INSTRUCTIONS}`,

  'single-session-preference': (question, goldAnswer, response) => `Below is a question, a rubric describing the desired personalized response, and a model response. Label the response CORRECT if it satisfies the rubric; otherwise WRONG. It need not cover every point of the rubric, only recall and use the user's personal information correctly.

<QUESTION>
${question}
</QUESTION>
<RUBRIC>
${goldAnswer}
</RUBRIC>
<RESPONSE>
${response}
</RESPONSE>

${GRADING_OUTPUT_INSTRUCTIONS}`,
};

/** Grading prompt for a question category; unknown categories use the default rubric. */
export function buildGradingPrompt(
  category: string,
  question: string,
  goldAnswer: string,
  response: string
): string {
  const rubric = GRADING_RUBRICS[category] ?? defaultRubric;
  return rubric(question, goldAnswer, response);
}

export const COMPLETENESS_SYSTEM_PROMPT = `You are an expert evaluator who decides whether retrieved context holds enough information to answer a question. Reply with a JSON object only.`;

export function buildCompletenessPrompt(question: string, goldAnswer: string, context: string): string {
  return `Decide whether the CONTEXT below holds the information needed to answer the QUESTION the way the GOLD ANSWER does.
You are not grading an answer. Judge the context only.

<QUESTION>
${question}
</QUESTION>

<GOLD ANSWER>
${goldAnswer}
</GOLD ANSWER>

<CONTEXT>
${context}
</CONTEXT>

Grades:
- COMPLETE: every element of the gold answer is present, in enough detail to build the full answer.
- PARTIAL: some elements are present but key details are missing.
- INSUFFICIENT: most or all of the needed information is absent, or the context is off-topic.

Dates:
- A fact with a date range records when the event happened. Past dates are still valid context.
- Mark an element missing only when it is absent, never because its date has passed.

List the elements you found in present_elements and the ones that are absent in missing_elements.

Respond with a JSON object of the form:
{"completeness": "COMPLETE" | "PARTIAL" | "INSUFFICIENT", "reasoning": "<one or two sentences>", "missing_elements": ["..."], "present_elements": ["..."]}`;
}

export function renderContext(facts: string[], entities: string[], episodes: string[]): string {
  const sections = [
    `FACTS and ENTITIES below are the most relevant context for the current question.
Each fact carries the time of the event it describes. A fact saying something happened "a week ago" is stamped with the date of that week, not the date it was said.

<FACTS>
${facts.join('\n')}
</FACTS>

<ENTITIES>
${entities.join('\n')}
</ENTITIES>`,
  ];

  if (episodes.length > 0) {
    sections.push(`<MESSAGES>
${episodes.join('\n')}
</MESSAGES>`);
  }

  return sections.join('\n\n');
}
