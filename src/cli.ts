#!/usr/bin/env node
import axios from 'axios';
import cac from 'cac';
import { spawn } from 'child_process';
import * as net from 'net';
import * as path from 'path';
import { FsRepository } from './adapters/gateways/FsRepository';
import { CliPresenter } from './adapters/presenters/CliPresenter';
import {
  InlineRequest,
  InlineResponse,
  SliceDirection,
  SliceRequest,
  SliceResponse,
} from './domain/entities';
import { SourceLocation } from './domain/SourceLocation';
import { createEngine } from './engine';
import { createServer } from './infrastructure/server/server';
import { StdioTransport } from './infrastructure/stdio/StdioTransport';
import { readDaemonInfo, removeDaemonInfo } from './utils/daemon';

const cli = cac('code-slicer');
const presenter = new CliPresenter();
const files = new FsRepository();

interface SliceOptions {
  direction: string;
  language?: string;
  table?: boolean;
  apply?: boolean;
}

interface InlineOptions {
  language?: string;
  write?: boolean;
}

async function isServerRunning(port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = new net.Socket();
    socket.setTimeout(500);
    socket.on('connect', () => {
      socket.destroy();
      resolve(true);
    });
    socket.on('timeout', () => {
      socket.destroy();
      resolve(false);
    });
    socket.on('error', () => {
      resolve(false);
    });
    socket.connect(port, '127.0.0.1');
  });
}

async function isHealthy(port: number): Promise<boolean> {
  try {
    await axios.get(`http://localhost:${port}/health`);
    return true;
  } catch {
    return false;
  }
}

async function waitForServer(retries = 30, delay = 500): Promise<number> {
  for (let i = 0; i < retries; i++) {
    const info = await readDaemonInfo(process.cwd());
    if (info && (await isHealthy(info.port))) {
      return info.port;
    }
    await new Promise((r) => setTimeout(r, delay));
  }
  throw new Error('Server failed to start within timeout');
}

async function ensureServerRunning(): Promise<number> {
  const info = await readDaemonInfo(process.cwd());
  if (info) {
    if (await isServerRunning(info.port)) {
      return info.port;
    }
    // Stale file
    await removeDaemonInfo(process.cwd());
  }

  console.error('Server not running. Starting server...');

  const isTs = __filename.endsWith('.ts');
  const scriptPath = isTs ? path.join(__dirname, 'main.ts') : path.join(__dirname, 'main.js');

  const command = isTs ? 'npx' : 'node';
  const args = isTs ? ['ts-node', scriptPath] : [scriptPath];

  const child = spawn(command, args, {
    detached: true,
    stdio: 'ignore',
    cwd: process.cwd(),
  });

  child.unref();

  const port = await waitForServer();
  console.error(`Server started on port ${port}.`);
  return port;
}

function handleError(error: unknown) {
  if (axios.isAxiosError(error) && error.response) {
    console.error(`Error: ${error.response.status} - ${JSON.stringify(error.response.data)}`);
  } else if (error instanceof Error) {
    console.error(`Error: ${error.message}`);
  } else {
    console.error('Unknown error occurred');
  }
  process.exit(1);
}

function toDirection(value: string): SliceDirection {
  const direction = value.toUpperCase();
  if (direction !== 'BACKWARD' && direction !== 'FORWARD') {
    throw new Error(`Unknown direction: ${value} (expected backward or forward)`);
  }
  return direction;
}

// Wrap action to ensure server is running
const withServer =
  <A extends unknown[]>(action: (baseUrl: string, ...args: A) => Promise<void>) =>
  async (...args: A) => {
    try {
      const port = await ensureServerRunning();
      const baseUrl = `http://localhost:${port}`;
      await action(baseUrl, ...args);
    } catch (error) {
      handleError(error);
    }
  };

cli
  .command('slice <location>', 'Find the statements a slice at file:line:col would remove')
  .option('--direction <direction>', 'Slice direction (backward, forward)', {
    default: 'backward',
  })
  .option('--language <language>', 'Language name, overriding the file extension')
  .option('--table', 'Output in table format')
  .option('--apply', 'Print the file with the slice applied')
  .action(
    withServer(async (baseUrl, location: string, options: SliceOptions) => {
      const direction = toDirection(options.direction);
      const { filePath, point } = resolveLocation(location);
      const { content } = await files.readSource(filePath);

      const request: SliceRequest = {
        source: { filename: filePath, content, language: options.language, point },
        direction,
      };
      const response = await axios.post<SliceResponse>(`${baseUrl}/slice`, request);
      presenter.presentSlice(response.data, { filePath, content, point }, options);
    }),
  );

cli
  .command(
    'inline <call> <target>',
    'Inline the function defined at target into the call at file:line:col',
  )
  .option('--language <language>', 'Language name, overriding the file extension')
  .option('--write', 'Write the result back to the calling file')
  .action(
    withServer(async (baseUrl, call: string, target: string, options: InlineOptions) => {
      const caller = resolveLocation(call);
      const definition = resolveLocation(target);
      const { content } = await files.readSource(caller.filePath);
      const { content: targetContent } = await files.readSource(definition.filePath);

      const request: InlineRequest = {
        source: {
          filename: caller.filePath,
          content,
          language: options.language,
          point: caller.point,
        },
        targetContent,
        targetPoint: definition.point,
      };
      const response = await axios.post<InlineResponse>(`${baseUrl}/inline`, request);
      if (options.write) {
        await files.writeSource({ filename: caller.filePath, content: response.data.content });
      }
      presenter.presentInline(response.data, caller.filePath, options);
    }),
  );

cli
  .command('stdio', 'Answer JSON requests line by line on stdin/stdout')
  .action(async () => {
    const server = createServer(createEngine());
    try {
      await new StdioTransport(server, process.stdin, process.stdout).run();
      await server.close();
    } catch (error) {
      handleError(error);
    }
  });

cli.command('stop', 'Stop the background server').action(async () => {
  try {
    const info = await readDaemonInfo(process.cwd());
    if (!info) {
      console.log('Server is not running (no daemon file).');
      return;
    }
    const baseUrl = `http://localhost:${info.port}`;
    await axios.post(`${baseUrl}/shutdown`, {});
    console.log('Server stopping...');
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.log('Server is not running or failed to stop.', msg);
  }
});

function resolveLocation(location: string) {
  const parsed = SourceLocation.parse(location);
  return { filePath: parsed.filePath, point: parsed.toPoint() };
}

cli.help();
cli.version('0.1.0');

cli.parse();
