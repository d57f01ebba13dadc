/**
 * Cortex agent domain entities
 */
export interface AgentReference {
  database: string;
  schema: string;
  name: string;
}

export interface AgentDescriptor extends AgentReference {
  comment: string | null;
  owner: string | null;
  createdOn: string | null;
}

/**
 * An agent together with what its specification offers to users
 */
export interface AgentDetails extends AgentDescriptor {
  /** Starter questions from the agent's instructions, in their configured order */
  sampleQuestions: string[];
  tools: string[];
  orchestrationModel: string | null;
}

export type ToolChoice = { type: 'auto' } | { type: 'required' } | { type: 'tool'; name: string[] };

export interface AgentRunRequest {
  agent: AgentReference;
  threadId: string;
  parentMessageId: number;
  text: string;
  orchestrationModel?: string;
  toolChoice?: ToolChoice;
}

export interface ServerSentEvent {
  event: string;
  data: string;
  id?: string;
}

export interface AgentRunStream {
  requestId: string;
  events: AsyncIterable<ServerSentEvent>;
}
