/**
 * Response building blocks. Placeholders use `{{name}}`.
 */
export const RESPONSE_TEMPLATES = {
  greeting: "Hello! I'm your customer support agent. How can I help you today?",
  ticketHeading: '**Ticket Information:**',
  ticketId: '**Ticket ID:** {{id}}',
  ticketTitle: '**Title:** {{title}}',
  ticketStatus: '**Status:** {{status}}',
  ticketPriority: '**Priority:** {{priority}}',
  ticketDescription: '\n**Description:** {{description}}',
  updatesHeading: '\n**Latest Updates:**',
  update: '  - {{author}}: {{body}}',
  articlesHeading: '**Relevant Information:**',
  article: '\n{{position}}. **{{title}}** ({{category}})',
  articleContent: '   {{content}}',
  articleCut: '   ...',
  contextHeading: '**Based on your query:**',
  status: 'Your ticket is currently **{{status}}**.',
  progress: 'Latest update on your ticket: {{update}}',
  solution:
    "Based on our knowledge base, here's a potential solution: {{solution}}",
  noSolution:
    "I'm looking into solutions for you. Please check the relevant information above.",
  issue:
    "I see you're experiencing an issue. Your ticket describes: {{description}}",
  generic:
    "I've found some relevant information above that might help address your concern. " +
    'Please review the details and let me know if you need further assistance.',
  fallback:
    "I couldn't find specific information related to your query. " +
    'Could you please provide more details or a ticket reference? ' +
    "I'm here to help you!",
  separator: '\n---',
  closing: 'Is there anything else I can help you with?',
} as const

export type ResponseTemplateId = keyof typeof RESPONSE_TEMPLATES

/**
 * Interpolate variables in a response template.
 *
 * Replaces {{variable_name}} placeholders with provided values.
 * Preserves template syntax for missing variables.
 *
 * @example
 * ```ts
 * interpolateTemplate('Your ticket is currently **{{status}}**.', {
 *   status: 'Open',
 * })
 * // => 'Your ticket is currently **Open**.'
 * ```
 */
export function interpolateTemplate(
  template: string,
  variables: Record<string, string>
): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, varName: string) => {
    return variables[varName] ?? match
  })
}

export function renderTemplate(
  id: ResponseTemplateId,
  variables: Record<string, string> = {}
): string {
  return interpolateTemplate(RESPONSE_TEMPLATES[id], variables)
}
