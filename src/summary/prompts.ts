export function improvePrompt(transcript: string): string {
  return `
You are an assistant specialized in cleaning up transcripts of medical consultations.
Correct and improve the following transcript of a consultation:

Original transcript:
${transcript}

Please:
1. Fix grammar and spelling mistakes
2. Improve punctuation and formatting
3. Organize the text clearly and professionally
4. Keep every medical term and every relevant piece of information
5. Where possible, structure it in sections (e.g. Chief complaint, History, Physical exam)

Return only the improved text, without any additional comments:
`;
}

export const DEFAULT_SUMMARY_LAYOUT = `## VISIT SUMMARY
**Date:** [Extract it if mentioned, otherwise state that it was not specified]
**Patient:** [Name or identifier if mentioned, otherwise "Not specified"]

### CHIEF COMPLAINT
[Main reason for the visit]

### HISTORY
[Relevant history mentioned]

### PHYSICAL EXAM
[Exam findings, if mentioned]

### PLAN / TREATMENT
[Medications, guidance or treatments prescribed]

### NOTABLE REMARKS
[Other relevant points]

### FOLLOW-UP
[Follow-up instructions, if mentioned]`;

export function defaultSummaryPrompt(transcript: string): string {
  return `
You are a medical assistant specialized in summarizing medical consultations.
Analyze the following transcript and write a structured, professional summary:

Transcript:
${transcript}

Write the summary using exactly this structure:

${DEFAULT_SUMMARY_LAYOUT}

Keep the summary concise, professional and focused on the most important medical aspects.
`;
}

export function customSummaryPrompt(
  transcript: string,
  instruction: string,
): string {
  return `
You are a medical assistant specialized in summarizing medical consultations.
Analyze the following transcript following the user's specific instructions:

USER INSTRUCTIONS:
${instruction}

Transcript:
${transcript}

Write the summary following exactly the instructions the user gave above.
Keep it professional and focused on the most important medical aspects.
`;
}
