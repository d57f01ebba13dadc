import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AgentTurnService } from '../../application/services/AgentTurnService.js';
import type { ThreadService } from '../../application/services/ThreadService.js';
import type { FinalizedMessage } from '../../core/entities/Message.js';
import { MemoryRenderSink } from '../../infrastructure/render/MemoryRenderSink.js';
import { formatMessageAsMarkdown } from '../../utils/markdown.js';

export interface AskAgentArgs {
  question: string;
  thread_id?: string;
  agent_name?: string;
}

export interface AskAgentResult {
  threadId: string;
  message: FinalizedMessage;
  markdown: string;
}

/**
 * Run one turn against the agent, creating a thread when none is given
 */
export async function askAgent(
  turnService: AgentTurnService,
  threadService: ThreadService,
  args: AskAgentArgs
): Promise<AskAgentResult> {
  const threadId = args.thread_id || (await threadService.createThread(args.question.slice(0, 60))).threadId;
  const agent = args.agent_name ? { ...turnService.defaultAgent, name: args.agent_name } : undefined;

  const message = await turnService.sendMessage(threadId, args.question, new MemoryRenderSink(), { agent });
  return { threadId, message, markdown: withFooter(message, threadId) };
}

function withFooter(message: FinalizedMessage, threadId: string): string {
  const body = formatMessageAsMarkdown(message) || '_The agent returned no content._';
  return `${body}\n\n---\n_Thread: ${threadId} | Request: ${message.requestId}_`;
}

/**
 * Ask the last stored question of a thread again
 */
export async function regenerateAnswer(
  turnService: AgentTurnService,
  args: { thread_id: string; agent_name?: string }
): Promise<AskAgentResult> {
  const agent = args.agent_name ? { ...turnService.defaultAgent, name: args.agent_name } : undefined;
  const message = await turnService.regenerate(args.thread_id, new MemoryRenderSink(), { agent });
  return { threadId: args.thread_id, message, markdown: withFooter(message, args.thread_id) };
}

/**
 * Register the ask-agent and regenerate-answer tools
 */
export function registerAskAgentTool(
  server: McpServer,
  turnService: AgentTurnService,
  threadService: ThreadService,
  debugLog: (message: string) => void,
  notifyThreadUpdate?: (threadId: string) => void
) {
  server.tool(
    'ask-agent',
    'Ask the configured Snowflake Cortex agent a question. Continues a thread when thread_id is given, otherwise starts a new one.',
    {
      question: z.string().min(1).describe('The question for the agent'),
      thread_id: z.string().optional().describe('Thread to continue (from a previous answer or manage-threads)'),
      agent_name: z.string().optional().describe('Agent in the configured database and schema to use instead of the default'),
    },
    async (args) => {
      try {
        debugLog(`[ask-agent] Question: "${args.question.slice(0, 50)}"`);
        const result = await askAgent(turnService, threadService, args);
        notifyThreadUpdate?.(result.threadId);

        return {
          isError: result.message.status === 'error',
          content: [
            {
              type: 'text',
              text: result.markdown,
            },
          ],
        };
      } catch (error) {
        console.error('[ask-agent] Error:', error);
        return {
          isError: true,
          content: [
            {
              type: 'text',
              text: `Error asking agent: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
        };
      }
    }
  );

  server.tool(
    'regenerate-answer',
    'Ask the last question of a thread again and return the new answer',
    {
      thread_id: z.string().min(1).describe('Thread whose last question is asked again'),
      agent_name: z.string().optional().describe('Agent to use instead of the default'),
    },
    async (args) => {
      try {
        debugLog(`[regenerate-answer] Thread ${args.thread_id}`);
        const result = await regenerateAnswer(turnService, args);
        notifyThreadUpdate?.(result.threadId);

        return {
          isError: result.message.status === 'error',
          content: [
            {
              type: 'text',
              text: result.markdown,
            },
          ],
        };
      } catch (error) {
        console.error('[regenerate-answer] Error:', error);
        return {
          isError: true,
          content: [
            {
              type: 'text',
              text: `Error regenerating answer: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
        };
      }
    }
  );
}
