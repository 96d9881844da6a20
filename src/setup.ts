import { SERVER_NAME } from './constants.js';
import { selectBackend } from './dispatcher.js';
import type { Command } from './types.js';

export interface SetupContext {
  commands: readonly Command[];
  configPath: string;
  /** argv that launches this server, e.g. [process.execPath, '/path/to/dist/cli.js']. */
  launch: readonly string[];
  cwd: string;
}

const EXECUTION_LABELS = {
  local: 'Local system',
  container: 'Container',
  webhook: 'Webhook',
} as const;

/** Markdown instructions for wiring the server into an MCP client. */
export function renderSetupInstructions(ctx: SetupContext): string {
  const [command = 'node', ...launchArgs] = ctx.launch;
  const clientConfig = {
    mcpServers: {
      [SERVER_NAME]: {
        command,
        args: [...launchArgs, '--mcp', '--config', ctx.configPath],
        cwd: ctx.cwd,
      },
    },
  };

  const lines: string[] = [
    `# ${SERVER_NAME} setup`,
    '',
    '## MCP client configuration',
    '',
    'Add this to your MCP client settings:',
    '',
    '```json',
    JSON.stringify(clientConfig, null, 2),
    '```',
    '',
    '## Available tools',
    '',
    `${ctx.commands.length} tool(s) will be available:`,
    '',
  ];

  for (const cmd of ctx.commands) {
    const kind = selectBackend(cmd);
    lines.push(`### ${cmd.name}`);
    if (cmd.description) lines.push(`**Description**: ${cmd.description}`, '');
    if (kind === 'container') {
      lines.push(`**Execution**: ${EXECUTION_LABELS.container} (\`${cmd.container}\`)`, '');
    } else if (kind === 'webhook') {
      lines.push(`**Execution**: ${EXECUTION_LABELS.webhook} (\`${cmd.webhook?.method || 'GET'} ${cmd.webhook?.url}\`)`, '');
    } else {
      lines.push(`**Execution**: ${EXECUTION_LABELS.local}`, '');
    }
  }

  const images = Array.from(
    new Set(ctx.commands.filter((cmd) => selectBackend(cmd) === 'container').map((cmd) => cmd.container)),
  );
  if (images.length > 0) {
    lines.push('## Container images', '', 'Pull these images before first use:', '', '```bash');
    for (const image of images) lines.push(`docker pull ${image}`);
    lines.push('```', '');
  }

  lines.push(
    '## Troubleshooting',
    '',
    `- **Config file**: \`${ctx.configPath}\``,
    `- **Working directory**: \`${ctx.cwd}\``,
    '- **Containers**: the container runtime must be running for containerized tools',
    '',
  );
  return lines.join('\n');
}
