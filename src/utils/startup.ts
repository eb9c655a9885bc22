/**
 * Startup Display
 *
 * Lists the initialized services and the HTTP endpoints once the server is up.
 */

import { getLLMDisplayName } from '@/config/config';
import type { Config } from '@/config/schema';
import { c, colors } from './colors';

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface StartupInfo {
  /** Neo4j connection URI */
  storeUri: string;
  /** "Provider/model", null when the LLM is not configured */
  llm: string | null;
  transcription: string | null;
  /** Tracker project, e.g. "OPS @ https://acme.atlassian.net" */
  tracker: string | null;
  wiki: string | null;
  rosterSize: number;
  recordings: {
    directory: string;
    pollIntervalSeconds: number;
    autoPoll: boolean;
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Configuration
// ═══════════════════════════════════════════════════════════════════════════════

/** Delay between initialization steps (ms) */
const STEP_DELAY = 50;

const DIVIDER = '━'.repeat(72);

const ENDPOINTS: ReadonlyArray<readonly [method: string, path: string, description: string]> = [
  ['POST', '/meetings', 'Process a transcript'],
  ['GET', '/meetings', 'Recent meetings'],
  ['GET', '/recordings', 'Recordings with processed flags'],
  ['GET', '/recordings/status', 'Guard status'],
  ['POST', '/recordings/poll', 'Run one poll cycle'],
  ['POST', '/recordings/:name/process', 'Process one recording'],
  ['POST', '/recordings/cache/clear', 'Forget processed recordings'],
  ['GET', '/roster', 'Members and aliases'],
  ['POST', '/roster/aliases', 'Add an alias'],
  ['GET', '/health', 'Health check']
];

// ═══════════════════════════════════════════════════════════════════════════════
// Utilities
// ═══════════════════════════════════════════════════════════════════════════════

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Log an initialization step. A null detail marks the service as disabled.
 */
function logStep(label: string, detail: string | null): void {
  const mark = detail === null ? c.dim('○') : c.brightGreen('✓');
  const labelText = detail === null ? c.dim(label) : c.white(label);
  const detailText = `${colors.dim}${detail ?? 'not configured'}${colors.reset}`;

  // Align details to column 30
  const padding = Math.max(1, 26 - label.length);
  console.log(`  ${mark} ${labelText}${' '.repeat(padding)}${detailText}`);
}

function displayEndpoint(method: string, path: string, description: string): void {
  const methodColor = method === 'GET' ? c.brightGreen : c.brightYellow;
  const methodText = methodColor(method.padEnd(6));
  const pathText = c.cyan(path.padEnd(28));
  console.log(`    • ${methodText} ${pathText} ${c.dim(description)}`);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Startup Display
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Display the initialization steps, server address and endpoints.
 * The banner is displayed separately before calling this.
 */
export async function displayStartup(config: Config, info: StartupInfo): Promise<void> {
  console.log(`\n  ${c.dim('Initializing...')}\n`);

  const steps: Array<[string, string | null]> = [
    ['Configuration loaded', `${info.rosterSize} roster members`],
    ['Neo4j connected', info.storeUri],
    ['LLM client', info.llm],
    ['Transcriber', info.transcription],
    ['Ticket tracker', info.tracker],
    ['Wiki', info.wiki]
  ];
  for (const [label, detail] of steps) {
    await sleep(STEP_DELAY);
    logStep(label, detail);
  }

  await sleep(STEP_DELAY);
  const { directory, pollIntervalSeconds, autoPoll } = info.recordings;
  logStep(
    'Recordings watcher',
    autoPoll ? `${directory} (every ${pollIntervalSeconds}s)` : `${directory} (manual)`
  );

  console.log(`\n  ${c.dim(DIVIDER)}\n`);

  const url = `http://localhost:${config.server.port}`;
  console.log(`  ${c.white('Server ready on')} ${c.brightCyan(url)}\n`);

  console.log(`  ${c.white('Endpoints:')}`);
  for (const [method, path, description] of ENDPOINTS) {
    displayEndpoint(method, path, description);
  }

  console.log(`\n  ${c.dim(DIVIDER)}\n`);
}

/**
 * Build startup info from config.
 */
export function buildStartupInfo(config: Config): StartupInfo {
  const llmName = getLLMDisplayName(config);
  return {
    storeUri: config.store.uri,
    llm: config.llm && llmName ? `${llmName}/${config.llm.defaults.model}` : null,
    transcription: config.transcription
      ? `${config.transcription.provider}/${config.transcription.model}`
      : null,
    tracker: config.tracker ? `${config.tracker.projectKey} @ ${config.tracker.baseUrl}` : null,
    wiki: config.wiki ? `${config.wiki.spaceKey} @ ${config.wiki.baseUrl}` : null,
    rosterSize: config.roster.members.length,
    recordings: config.recordings
  };
}
