/**
 * Control client: switches the mode of a running signal server.
 */
import { parseArgs } from 'node:util';
import { resolveServerUrl } from '../config.js';
import { MODES, isMode } from '../models/signal.js';
import { errorMessage, isJsonResponse, readJsonBody, stringField } from './http.js';

export const USAGE = `Usage: signal-mode <${MODES.join('|')}> [--url <base-url>]`;

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
  fetch: typeof fetch;
  env: NodeJS.ProcessEnv;
}

export const processIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  fetch: (input, init) => fetch(input, init),
  env: process.env,
};

/**
 * Runs the CLI with the arguments after the script name and resolves to the
 * process exit code.
 */
export async function runSetMode(argv: string[], io: CliIo = processIo): Promise<number> {
  let mode: string | undefined;
  let urlFlag: string | undefined;
  try {
    const { values, positionals } = parseArgs({
      args: argv,
      options: { url: { type: 'string' } },
      allowPositionals: true,
    });
    mode = positionals[0];
    urlFlag = values.url;
  } catch (err: unknown) {
    io.err(`Error: ${errorMessage(err)}`);
    io.err(USAGE);
    return 1;
  }

  if (mode === undefined) {
    io.err(USAGE);
    return 1;
  }
  if (!isMode(mode)) {
    io.err(`Error: Invalid mode '${mode}'. Choose from: ${MODES.join(', ')}`);
    return 1;
  }

  let baseUrl: string;
  try {
    baseUrl = resolveServerUrl(urlFlag, io.env);
  } catch (err: unknown) {
    io.err(`Error: ${errorMessage(err)}`);
    return 1;
  }

  const url = `${baseUrl}/set_mode/${mode}`;
  io.out(`Sending request to set mode to '${mode}' at ${url}...`);

  let res: Response;
  try {
    res = await io.fetch(url, { method: 'POST' });
  } catch (err: unknown) {
    io.err(`Error connecting to server: ${errorMessage(err)}`);
    return 1;
  }

  // An unreadable or malformed body is treated as no body.
  const body = await readJsonBody(res);

  if (!res.ok) {
    const message = stringField(body, 'message');
    io.err(
      message === undefined
        ? `Error: server responded with status ${res.status}`
        : `Error: server responded with status ${res.status}: ${message}`,
    );
    return 1;
  }

  if (!isJsonResponse(res)) {
    io.out(`Success: received non-JSON response (status code: ${res.status})`);
    return 0;
  }

  io.out(
    `Success: server responded with status '${stringField(body, 'status') ?? 'N/A'}', new mode is '${stringField(body, 'new_mode') ?? 'N/A'}'`,
  );
  return 0;
}
