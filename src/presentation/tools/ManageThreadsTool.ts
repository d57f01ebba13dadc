import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ThreadService } from '../../application/services/ThreadService.js';
import { messageText } from '../../core/entities/Message.js';
import type { RemoteThreadMessage } from '../../core/interfaces/ICortexClient.js';

export type ThreadAction = 'list' | 'view' | 'history' | 'rename' | 'delete';

const TextPayload = z.object({ text: z.string() });

/**
 * Text of a message payload as the Threads API stores it: JSON with a `text` field, or plain text
 */
export function remotePayloadText(payload: string): string {
  try {
    const parsed = TextPayload.safeParse(JSON.parse(payload));
    return parsed.success ? parsed.data.text : payload;
  } catch {
    return payload;
  }
}

function formatRemoteMessage(message: RemoteThreadMessage): string {
  const who = message.role === 'user' ? '👤 User' : '🤖 Agent';
  return `- **#${message.messageId} ${who}**: ${remotePayloadText(message.messagePayload)}`;
}

export interface ManageThreadsArgs {
  action: ThreadAction;
  thread_id?: string;
  thread_name?: string;
}

/**
 * Carry out a thread action and describe the outcome as markdown
 */
export async function manageThreads(threadService: ThreadService, args: ManageThreadsArgs): Promise<string> {
  if (args.action === 'list') {
    const threads = await threadService.listThreads();
    if (threads.length === 0) {
      return 'No threads found.';
    }
    const list = threads
      .map((thread) => `- **${thread.threadId}** ${thread.threadName || '(untitled)'}: ${thread.messageCount} messages`)
      .join('\n');
    return `# Threads\n\n${list}`;
  }

  if (!args.thread_id) {
    throw new Error(`thread_id is required for '${args.action}'`);
  }
  const threadId = args.thread_id;

  switch (args.action) {
    case 'view': {
      const messages = threadService.getMessages(threadId);
      if (messages.length === 0) {
        return `No messages stored for thread ${threadId}`;
      }
      const history = messages
        .map((message, idx) => {
          if (message.role === 'user') {
            return `${idx + 1}. **👤 User**\n${message.payload.text}\n`;
          }
          const status = message.payload.status === 'error' ? ' (error)' : '';
          return `${idx + 1}. **🤖 Agent${status}**\n${messageText(message.payload)}\n`;
        })
        .join('\n---\n\n');
      return `# Thread ${threadId}\n\n${history}`;
    }
    case 'history': {
      const remote = await threadService.getRemoteThread(threadId);
      if (remote.messages.length === 0) {
        return `Thread ${threadId} has no messages on the server`;
      }
      const title = remote.metadata.threadName || `Thread ${threadId}`;
      return `# ${title} (server history, newest first)\n\n${remote.messages.map(formatRemoteMessage).join('\n')}`;
    }
    case 'rename': {
      if (!args.thread_name) {
        throw new Error("thread_name is required for 'rename'");
      }
      await threadService.renameThread(threadId, args.thread_name);
      return `✓ Thread ${threadId} renamed to "${args.thread_name}"`;
    }
    case 'delete':
      await threadService.deleteThread(threadId);
      return `✓ Thread ${threadId} deleted`;
  }
}

/**
 * Register the manage-threads tool
 */
export function registerManageThreadsTool(
  server: McpServer,
  threadService: ThreadService,
  notifyThreadUpdate?: (threadId: string) => void
) {
  server.tool(
    'manage-threads',
    'Manage agent conversation threads - list, view stored messages, read the server history, rename or delete',
    {
      action: z
        .enum(['list', 'view', 'history', 'rename', 'delete'])
        .describe(
          "Action to perform: 'list' all threads, 'view' stored messages, 'history' as kept by the server, 'rename' or 'delete' a thread"
        ),
      thread_id: z.string().optional().describe('Thread to act on (not needed for list)'),
      thread_name: z.string().max(256).optional().describe('New name, for rename'),
    },
    async (args) => {
      try {
        const text = await manageThreads(threadService, args);
        if (args.thread_id && (args.action === 'rename' || args.action === 'delete')) {
          notifyThreadUpdate?.(args.thread_id);
        }
        return {
          content: [
            {
              type: 'text',
              text,
            },
          ],
        };
      } catch (error) {
        console.error('[manage-threads] Error:', error);
        return {
          isError: true,
          content: [
            {
              type: 'text',
              text: `Error managing threads: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
        };
      }
    }
  );
}
