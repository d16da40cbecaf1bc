/**
 * Interactive CLI client for a running Switchboard server.
 *
 * Pure HTTP client: talks to the REST API with fetch and imports nothing
 * from the server code.
 *
 * Usage: npm run chat -- [--server <url>]
 */
import { createInterface } from 'readline';
import { fileURLToPath } from 'url';
import { z } from 'zod';

// ─── ANSI Colors ────────────────────────────────────────────────

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const CYAN = '\x1b[36m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';
const MAGENTA = '\x1b[35m';

// ─── CLI Arg Parsing ────────────────────────────────────────────

interface CliArgs {
  serverUrl: string;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { serverUrl: 'http://localhost:3000' };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    if ((arg === '--server' || arg === '-s') && next) {
      args.serverUrl = next.replace(/\/+$/, '');
      i++;
    }
  }

  return args;
}

// ─── Command Parsing ────────────────────────────────────────────

export type Command =
  | { type: 'quit' }
  | { type: 'help' }
  | { type: 'agents' }
  | { type: 'workflows' }
  | { type: 'workflow'; id: string }
  | { type: 'cancel'; id: string }
  | { type: 'unknown'; name: string }
  | { type: 'message'; text: string };

export function parseCommand(input: string): Command {
  const trimmed = input.trim();
  if (!trimmed.startsWith('/')) return { type: 'message', text: trimmed };

  const [name = '', arg] = trimmed.split(/\s+/, 2);
  switch (name) {
    case '/quit':
    case '/exit':
    case '/q':
      return { type: 'quit' };
    case '/help':
    case '/h':
      return { type: 'help' };
    case '/agents':
      return { type: 'agents' };
    case '/workflows':
      return { type: 'workflows' };
    case '/workflow':
      return arg ? { type: 'workflow', id: arg } : { type: 'unknown', name };
    case '/cancel':
      return arg ? { type: 'cancel', id: arg } : { type: 'unknown', name };
    default:
      return { type: 'unknown', name };
  }
}

// ─── Response Schemas ───────────────────────────────────────────

const dispatchResponseSchema = z.object({
  content: z.string(),
  metadata: z.record(z.unknown()),
  error: z.string().optional(),
});

const agentSchema = z.object({
  agentId: z.string(),
  kind: z.string(),
  capabilities: z.array(z.string()),
  state: z.string(),
  successRate: z.number(),
});

const workflowSummarySchema = z.object({
  id: z.string(),
  originalRequest: z.string(),
  status: z.string(),
  subtaskCount: z.number(),
  completedCount: z.number(),
});

const workflowDetailSchema = z.object({
  id: z.string(),
  status: z.string(),
  subtasks: z.array(
    z.object({
      id: z.string(),
      description: z.string(),
      status: z.string(),
      assignedAgentId: z.string().nullable(),
      error: z.string().nullable(),
    }),
  ),
});

const agentPageSchema = z.object({ items: z.array(agentSchema), total: z.number() });
const workflowPageSchema = z.object({ items: z.array(workflowSummarySchema), total: z.number() });

export type DispatchResponse = z.infer<typeof dispatchResponseSchema>;
export type AgentView = z.infer<typeof agentSchema>;
export type WorkflowSummaryView = z.infer<typeof workflowSummarySchema>;
export type WorkflowDetailView = z.infer<typeof workflowDetailSchema>;

// ─── Formatting ─────────────────────────────────────────────────

export function formatResponse(response: DispatchResponse): string {
  const route = typeof response.metadata['route'] === 'string' ? response.metadata['route'] : 'unknown';
  const header = `${MAGENTA}Switchboard:${RESET} ${response.content}`;
  const footer = `${DIM}  (route: ${route})${RESET}`;
  if (response.error !== undefined) {
    return `${header}\n${RED}  [error] ${response.error}${RESET}\n${footer}`;
  }
  return `${header}\n${footer}`;
}

export function formatAgent(agent: AgentView): string {
  const rate = `${Math.round(agent.successRate * 100)}%`;
  return `  ${CYAN}${agent.agentId}${RESET} ${DIM}[${agent.kind}, ${agent.state}, ${rate}]${RESET} ${agent.capabilities.join(', ')}`;
}

export function formatWorkflowSummary(workflow: WorkflowSummaryView): string {
  const request =
    workflow.originalRequest.length > 60
      ? workflow.originalRequest.slice(0, 57) + '...'
      : workflow.originalRequest;
  return `  ${CYAN}${workflow.id}${RESET} ${workflow.status} ${DIM}(${workflow.completedCount}/${workflow.subtaskCount})${RESET} ${request}`;
}

export function formatWorkflowDetail(workflow: WorkflowDetailView): string {
  const lines = [`${BOLD}Workflow ${workflow.id}${RESET} ${workflow.status}`];
  for (const subtask of workflow.subtasks) {
    const agent = subtask.assignedAgentId ?? 'unassigned';
    const error = subtask.error ? ` ${RED}${subtask.error}${RESET}` : '';
    lines.push(`  ${subtask.id} ${subtask.status} ${DIM}[${agent}]${RESET} ${subtask.description}${error}`);
  }
  return lines.join('\n');
}

// ─── API Helpers ────────────────────────────────────────────────

const errorEnvelopeSchema = z.object({
  success: z.literal(false),
  error: z.object({ code: z.string(), message: z.string() }),
});

const successEnvelopeSchema = z.object({
  success: z.literal(true),
  data: z.unknown(),
});

async function callApi<T extends z.ZodTypeAny>(
  url: string,
  schema: T,
  init?: RequestInit,
): Promise<z.infer<T>> {
  const res = await fetch(url, init);
  const body: unknown = await res.json();

  const failure = errorEnvelopeSchema.safeParse(body);
  if (failure.success) {
    throw new Error(`${failure.data.error.code}: ${failure.data.error.message}`);
  }
  const envelope = successEnvelopeSchema.parse(body);
  return schema.parse(envelope.data);
}

function postJson(payload: unknown): RequestInit {
  return {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(payload),
  };
}

// ─── Help ───────────────────────────────────────────────────────

function printHelp(): void {
  console.log(`
${BOLD}Commands:${RESET}
  ${CYAN}/help${RESET}            Show this help
  ${CYAN}/agents${RESET}          List registered agents
  ${CYAN}/workflows${RESET}       List recent workflows
  ${CYAN}/workflow <id>${RESET}   Show a workflow's subtasks
  ${CYAN}/cancel <id>${RESET}     Cancel a running workflow
  ${CYAN}/quit${RESET}            Exit
  ${CYAN}Ctrl+C${RESET}           Exit
`);
}

// ─── Command Execution ──────────────────────────────────────────

async function runCommand(serverUrl: string, cmd: Command): Promise<void> {
  switch (cmd.type) {
    case 'agents': {
      const page = await callApi(`${serverUrl}/agents?limit=100`, agentPageSchema);
      if (page.items.length === 0) console.log(`${YELLOW}No agents registered.${RESET}`);
      for (const agent of page.items) console.log(formatAgent(agent));
      break;
    }
    case 'workflows': {
      const page = await callApi(`${serverUrl}/workflows`, workflowPageSchema);
      if (page.items.length === 0) console.log(`${YELLOW}No workflows yet.${RESET}`);
      for (const workflow of page.items) console.log(formatWorkflowSummary(workflow));
      break;
    }
    case 'workflow': {
      const workflow = await callApi(
        `${serverUrl}/workflows/${encodeURIComponent(cmd.id)}`,
        workflowDetailSchema,
      );
      console.log(formatWorkflowDetail(workflow));
      break;
    }
    case 'cancel': {
      const result = await callApi(
        `${serverUrl}/workflows/${encodeURIComponent(cmd.id)}/cancel`,
        z.object({ cancelled: z.boolean() }),
        { method: 'POST' },
      );
      console.log(result.cancelled ? `${YELLOW}Cancellation requested.${RESET}` : `${DIM}Workflow already finished.${RESET}`);
      break;
    }
    case 'message': {
      const response = await callApi(
        `${serverUrl}/requests`,
        dispatchResponseSchema,
        postJson({ query: cmd.text }),
      );
      console.log(formatResponse(response));
      break;
    }
    case 'unknown':
      console.log(`${RED}Unknown command ${cmd.name}. Type /help for commands.${RESET}`);
      break;
    case 'help':
      printHelp();
      break;
    case 'quit':
      break;
  }
}

// ─── Main Loop ──────────────────────────────────────────────────

function main(): void {
  const args = parseCliArgs(process.argv.slice(2));

  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  console.log(`\n${BOLD}${CYAN}  Switchboard — Interactive Client${RESET}`);
  console.log(`${DIM}  Server: ${args.serverUrl}${RESET}`);
  console.log(`${DIM}  Type /help for commands, /quit to exit${RESET}\n`);

  function prompt(): void {
    rl.question(`${GREEN}You:${RESET} `, (input) => {
      const cmd = parseCommand(input);

      if (cmd.type === 'quit') {
        rl.close();
        return;
      }
      if (cmd.type === 'message' && !cmd.text) {
        prompt();
        return;
      }

      void runCommand(args.serverUrl, cmd)
        .catch((error: unknown) => {
          const message = error instanceof Error ? error.message : String(error);
          console.log(`${RED}Error: ${message}${RESET}`);
          console.log(`${DIM}Is the server running? Try: npm run dev${RESET}`);
        })
        .finally(() => {
          console.log('');
          prompt();
        });
    });
  }

  // Handle Ctrl+C and /quit
  rl.on('close', () => {
    console.log(`\n${DIM}Goodbye!${RESET}\n`);
    process.exit(0);
  });

  prompt();
}

// ─── Entry Point ────────────────────────────────────────────────

// Only run when invoked directly (not when imported for testing)
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main();
}
