import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AgentTurnService } from '../../application/services/AgentTurnService.js';
import type { AgentDetails } from '../../core/entities/Agent.js';

/**
 * Agent details as markdown, sample questions numbered in their configured order
 */
export function formatAgentDetails(agent: AgentDetails): string {
  const lines = [`# ${agent.database}.${agent.schema}.${agent.name}`];
  if (agent.comment) {
    lines.push('', agent.comment);
  }
  lines.push('', `**Model:** ${agent.orchestrationModel ?? 'auto'}`);
  lines.push(`**Tools:** ${agent.tools.length > 0 ? agent.tools.join(', ') : 'none'}`);

  if (agent.sampleQuestions.length > 0) {
    lines.push('', '## Sample questions', '');
    agent.sampleQuestions.forEach((question, idx) => lines.push(`${idx + 1}. ${question}`));
  }
  return lines.join('\n');
}

/**
 * Register the describe-agent tool
 */
export function registerDescribeAgentTool(server: McpServer, turnService: Pick<AgentTurnService, 'describeAgent'>) {
  server.tool(
    'describe-agent',
    'Show the model, tools and sample questions of an agent. Uses the configured agent unless agent_name is given.',
    {
      agent_name: z.string().optional().describe('Agent in the configured database and schema'),
    },
    async (args) => {
      try {
        const agent = await turnService.describeAgent(args.agent_name);
        return {
          content: [
            {
              type: 'text',
              text: formatAgentDetails(agent),
            },
          ],
        };
      } catch (error) {
        console.error('[describe-agent] Error:', error);
        return {
          isError: true,
          content: [
            {
              type: 'text',
              text: `Error describing agent: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
        };
      }
    }
  );
}
