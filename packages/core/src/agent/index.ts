/**
 * Support agent: ticket lookup, knowledge search and response composition.
 */

export {
  SupportAgent,
  type AgentResponse,
  type AgentSource,
  type KnowledgeSearch,
  type SupportAgentOptions,
} from './support-agent'
export {
  ARTICLE_QUOTE_LENGTH,
  MAX_QUOTED_ARTICLES,
  RECENT_COMMENTS,
  SNIPPET_LENGTH,
  composeResponse,
  contextualLine,
  type ResponseInput,
} from './respond'
export { ConversationHistory, type ConversationEntry } from './history'
export {
  RESPONSE_TEMPLATES,
  interpolateTemplate,
  renderTemplate,
  type ResponseTemplateId,
} from './templates'
