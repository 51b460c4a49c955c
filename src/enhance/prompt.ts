export const MAX_PROMPT_DOC_CHARS = 2000

export const ASSESSMENT_SYSTEM_PROMPT = `You are a cybersecurity expert at a financial institution. Your task is to assess whether a cloud service needs to comply with specific security controls.
Based solely on the information in the user message, assess whether the cloud service should be subject to the control policy.
Provide a confidence level (HIGH, MEDIUM, or LOW) and a brief justification (2-3 sentences maximum).
MUST STRICTLY RESPOND with a JSON code fence only containing a single JSON object:
{
  "is_applicable": true or false,
  "confidence": "HIGH" | "MEDIUM" | "LOW",
  "justification": "Your brief justification here"
}`

export function buildAssessmentQuery(input: {
  serviceName: string
  securityText: string
  threatNote: string
  controlDescription: string
}): string {
  return [
    `CLOUD SERVICE: ${input.serviceName}`,
    `SECURITY DOCUMENTATION EXCERPT:\n${input.securityText.slice(0, MAX_PROMPT_DOC_CHARS)}`,
    `ANALYST CONCERN:\n${input.threatNote}`,
    `CONTROL POLICY:\n${input.controlDescription}`
  ].join('\n\n')
}
