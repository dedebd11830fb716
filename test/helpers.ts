import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import pino, { type Logger } from 'pino';
import type { ConversionResult, VectorConverter } from '../src/types';

export const fixturePath = (name: string): string => path.join(__dirname, 'fixtures', name);

export const readFixture = (name: string): Promise<string> => fs.readFile(fixturePath(name), 'utf-8');

export const makeTempDir = (): Promise<string> => fs.mkdtemp(path.join(os.tmpdir(), 'dxf-laser-prep-'));

export type LogLine = { level: number; msg: string; [key: string]: unknown };

/** pino logger that keeps every line in memory. */
export function captureLogger(): { logger: Logger; lines: LogLine[]; messages: () => string[] } {
  const lines: LogLine[] = [];
  const logger = pino({ level: 'trace', base: null }, {
    write(chunk: string) {
      lines.push(JSON.parse(chunk));
    },
  });
  return { logger, lines, messages: () => lines.map((line) => line.msg) };
}

/** Stands in for Inkscape: writes a canned SVG to the requested path, then reports `result`. */
export class FakeConverter implements VectorConverter {
  readonly calls: Array<{ dxfPath: string; svgPath: string }> = [];

  constructor(
    private readonly svg: string,
    private readonly result: ConversionResult = { status: 'success' },
  ) {}

  async convert(dxfPath: string, svgPath: string): Promise<ConversionResult> {
    this.calls.push({ dxfPath, svgPath });
    await fs.writeFile(svgPath, this.svg, 'utf-8');
    return this.result;
  }
}
