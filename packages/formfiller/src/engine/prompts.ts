/**
 * Prompt templates for resume-grounded answers.
 *
 * One template per answer shape: free text, one option of a dropdown, one
 * option of a radio group. Every template embeds the field name and the
 * resume excerpt.
 */

/** Answer the text prompt asks for when the resume has nothing relevant. */
export const NOT_AVAILABLE = 'Not available';

const NO_RESUME = '(no resume provided)';

export function truncateResume(text: string, maxChars: number): string {
  const trimmed = text.trim();
  if (!trimmed) return NO_RESUME;
  return trimmed.length > maxChars ? trimmed.slice(0, maxChars) : trimmed;
}

function formatOptions(options: readonly string[]): string {
  return options.map((option) => `- ${option}`).join('\n');
}

export function buildTextPrompt(fieldName: string, resume: string): string {
  return `You are filling in a job application form on behalf of the applicant whose resume is below.

Question: ${fieldName}

Resume:
${resume}

Rules:
- Answer with the exact value to type into the field and nothing else. Do not repeat the question.
- Keep the answer as short as possible and favourable to the applicant.
- Yes/no questions: answer only "yes" or "no".
- Numeric questions ("how many", years, counts): answer only the number.
- Phone numbers: answer only the digits.
- Personal details (first name, last name, email, address, LinkedIn, GitHub, ...): answer only the value from the resume.
- If the resume does not contain the answer, reply exactly "${NOT_AVAILABLE}" without explanation.`;
}

export function buildSelectPrompt(fieldName: string, options: readonly string[], resume: string): string {
  return `You are filling in a job application form on behalf of the applicant whose resume is below.

Select the right option for the dropdown "${fieldName}".

Options:
${formatOptions(options)}

Resume:
${resume}

Favour the answer most likely to get the applicant an interview. Reply with the text of one option exactly as written and nothing else.`;
}

export function buildRadioPrompt(fieldName: string, options: readonly string[], resume: string): string {
  return `You are filling in a job application form on behalf of the applicant whose resume is below.

Choose the right option for the question "${fieldName}".

Options:
${formatOptions(options)}

Resume:
${resume}

Favour the answer most likely to get the applicant an interview. Reply with the text of one option exactly as written and nothing else.`;
}

/** Remove code fences and wrapping quotes that models like to add. */
export function cleanAnswer(raw: string): string {
  let answer = raw.trim();

  const fenced = answer.match(/^```[\w-]*\s*\n?([\s\S]*?)\n?```$/);
  if (fenced) answer = (fenced[1] ?? '').trim();

  while (answer.length >= 2 && /^(["'`])[\s\S]*\1$/.test(answer)) {
    answer = answer.slice(1, -1).trim();
  }
  return answer;
}
