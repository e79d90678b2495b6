/**
 * Shared stand-ins for tests: fake rasters and an in-process WMS adapter
 */

import type { AxiosAdapter, InternalAxiosRequestConfig } from 'axios';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

/**
 * PNG signature followed by filler bytes
 */
export function fakePng(size = 1024, fill = 0x2a): Buffer {
  const payload = Buffer.alloc(size, fill);
  PNG_SIGNATURE.forEach((byte, index) => {
    payload[index] = byte;
  });
  return payload;
}

export interface WmsReply {
  status?: number;
  body: Buffer | string;
}

export type WmsResponder = (params: Record<string, string>, callNumber: number) => WmsReply;

export interface FakeWms {
  adapter: AxiosAdapter;
  calls: Array<Record<string, string>>;
  times: () => string[];
}

function stringParams(config: InternalAxiosRequestConfig): Record<string, string> {
  const params: Record<string, unknown> = config.params ?? {};
  return Object.fromEntries(Object.entries(params).map(([key, value]) => [key, String(value)]));
}

/**
 * Axios adapter answering GetMap requests from `respond`
 */
export function fakeWms(respond: WmsResponder): FakeWms {
  const calls: Array<Record<string, string>> = [];
  const adapter: AxiosAdapter = async (config) => {
    const params = stringParams(config);
    calls.push(params);
    const reply = respond(params, calls.length);
    const status = reply.status ?? 200;
    return {
      data: typeof reply.body === 'string' ? Buffer.from(reply.body) : reply.body,
      status,
      statusText: String(status),
      headers: {},
      config,
    };
  };
  return { adapter, calls, times: () => calls.map((params) => params.TIME) };
}

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function silenceConsole(): void {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
}
