#!/usr/bin/env npx tsx
/**
 * Local API testing CLI.
 *
 * Sends a message (and optionally a schedule file first) to the local
 * sessions API.
 *
 * Usage:
 *   npm run message "I'm attending a developer conference, interested in AI"
 *   npm run message -- --schedule ./schedule.json "Plan my day"
 *   npm run message -- --session <id> "Only afternoon talks please"
 */

import { readFileSync } from 'fs';

const BASE_URL = process.env.BASE_URL || 'http://localhost:3000';

interface Options {
  session: string;
  schedule: string;
  stream: boolean;
  message: string;
}

function parseArgs(args: string[]): Options {
  const options: Options = {
    session: '',
    schedule: '',
    stream: false,
    message: '',
  };

  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--session' || arg === '-s') {
      options.session = args[++i] || options.session;
    } else if (arg === '--schedule' || arg === '-f') {
      options.schedule = args[++i] || options.schedule;
    } else if (arg === '--stream') {
      options.stream = true;
    } else if (arg === '--help' || arg === '-h') {
      printHelp();
      process.exit(0);
    } else if (!arg.startsWith('-')) {
      positional.push(arg);
    }
  }

  options.message = positional.join(' ');

  return options;
}

function printHelp(): void {
  console.log(`
Local Sessions API CLI

Usage:
  npm run message "your message here"
  npm run message -- --schedule ./schedule.json "message"
  npm run message -- --session <id> "message"

Options:
  --session, -s     Continue an existing session (default: create one)
  --schedule, -f    Upload a schedule JSON file before sending
  --stream          Print progress events as they arrive
  --help, -h        Show this help message
`);
}

async function postJson(path: string, body: unknown, accept = 'application/json'): Promise<Response> {
  return fetch(`${BASE_URL}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', Accept: accept },
    body: JSON.stringify(body),
  });
}

async function run(options: Options): Promise<void> {
  if (!options.message) {
    console.error('Error: No message provided');
    console.error('Usage: npm run message "your message"');
    process.exit(1);
  }

  let sessionId = options.session;
  if (!sessionId) {
    const created = await postJson('/api/sessions', {});
    const session: unknown = await created.json();
    if (typeof session !== 'object' || session === null || !('id' in session) || typeof session.id !== 'string') {
      throw new Error(`Unexpected session response (${created.status})`);
    }
    sessionId = session.id;
    console.log(`Created session: ${sessionId}`);
  }

  if (options.schedule) {
    const document: unknown = JSON.parse(readFileSync(options.schedule, 'utf-8'));
    const uploaded = await postJson(`/api/sessions/${sessionId}/schedule`, document);
    console.log(`Upload (${uploaded.status}): ${await uploaded.text()}`);
  }

  console.log('----------------------------------------');
  console.log(`Session: ${sessionId}`);
  console.log(`Message: ${options.message}`);
  console.log('----------------------------------------');

  const response = await postJson(
    `/api/sessions/${sessionId}/messages`,
    { message: options.message },
    options.stream ? 'text/event-stream' : 'application/json'
  );

  console.log(`Response Status: ${response.status}`);
  console.log(await response.text());
}

// Parse arguments (skip node and script path)
const options = parseArgs(process.argv.slice(2));

run(options).catch((error: unknown) => {
  if (error instanceof Error && error.message.includes('ECONNREFUSED')) {
    console.error('Error: Could not connect to server');
    console.error('Make sure the server is running: npm run dev');
  } else {
    console.error('Error:', error instanceof Error ? error.message : error);
  }
  process.exit(1);
});
