export { AgentsAPI } from './AgentsAPI';
export { AgentTestsAPI } from './AgentTestsAPI';
export { BatchCallingAPI } from './BatchCallingAPI';
export { ConversationsAPI } from './ConversationsAPI';
export { KnowledgeBaseAPI, RAG_EMBEDDING_MODELS } from './KnowledgeBaseAPI';
export { LlmUsageAPI } from './LlmUsageAPI';
export { McpServersAPI, MCP_APPROVAL_POLICIES } from './McpServersAPI';
export { OutboundCallingAPI } from './OutboundCallingAPI';
export { PhoneNumbersAPI } from './PhoneNumbersAPI';
export { SecretsAPI } from './SecretsAPI';
export { TestInvocationsAPI } from './TestInvocationsAPI';
export { ToolsAPI } from './ToolsAPI';
export { WidgetsAPI } from './WidgetsAPI';
export { WorkspaceAPI } from './WorkspaceAPI';
