import * as crypto from 'crypto';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

export interface DaemonInfo {
  port: number;
  pid: number;
}

export function getDaemonFilePath(projectRoot: string): string {
  const hash = crypto.createHash('md5').update(projectRoot).digest('hex');
  return path.join(os.tmpdir(), `code-slicer-daemon-${hash}.json`);
}

export async function writeDaemonInfo(projectRoot: string, info: DaemonInfo): Promise<void> {
  await fs.writeFile(getDaemonFilePath(projectRoot), JSON.stringify(info));
}

/** Null when no daemon file exists or it does not hold a port and pid. */
export async function readDaemonInfo(projectRoot: string): Promise<DaemonInfo | null> {
  let content: string;
  try {
    content = await fs.readFile(getDaemonFilePath(projectRoot), 'utf-8');
  } catch {
    return null;
  }
  return parseDaemonInfo(content);
}

export async function removeDaemonInfo(projectRoot: string): Promise<void> {
  await fs.rm(getDaemonFilePath(projectRoot), { force: true });
}

function parseDaemonInfo(content: string): DaemonInfo | null {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    return null;
  }
  if (typeof data !== 'object' || data === null || !('port' in data) || !('pid' in data)) {
    return null;
  }
  const { port, pid } = data;
  if (typeof port !== 'number' || typeof pid !== 'number') {
    return null;
  }
  return { port, pid };
}
