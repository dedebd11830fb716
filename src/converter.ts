import { spawn } from 'child_process';
import type { Logger } from 'pino';
import type { ConversionResult, InkscapeCliStyle, VectorConverter } from './types';
import { errorMessage } from './errors';

export type InkscapeConverterOptions = {
  program: string;
  cliStyle: InkscapeCliStyle;
  logger?: Logger;
};

// 0.92 takes `-l` (--export-plain-svg=FILE); 1.x split it into a flag plus --export-filename.
export function buildInkscapeArgs(cliStyle: InkscapeCliStyle, dxfPath: string, svgPath: string): string[] {
  switch (cliStyle) {
    case 'legacy':
      return ['-l', svgPath, dxfPath];
    case 'modern':
      return ['--export-plain-svg', `--export-filename=${svgPath}`, dxfPath];
  }
}

export class InkscapeConverter implements VectorConverter {
  constructor(private readonly options: InkscapeConverterOptions) {}

  convert(dxfPath: string, svgPath: string): Promise<ConversionResult> {
    const { program, cliStyle, logger } = this.options;
    const args = buildInkscapeArgs(cliStyle, dxfPath, svgPath);
    logger?.debug({ program, args }, 'Running converter');

    return new Promise((resolve) => {
      let stderr = '';
      let settled = false;
      const settle = (result: ConversionResult) => {
        if (settled) return;
        settled = true;
        resolve(result);
      };

      const child = spawn(program, args);
      child.stdout?.on('data', (data) => { logger?.trace(String(data).trim()); });
      child.stderr?.on('data', (data) => { stderr += String(data); });

      child.on('error', (error) => {
        settle({ status: 'error', message: `Could not start ${program}: ${errorMessage(error)}`, exitCode: null });
      });

      child.on('close', (code) => {
        if (code === 0) {
          settle({ status: 'success' });
        } else {
          const detail = stderr.trim();
          settle({
            status: 'error',
            message: `${program} exited with code ${code}${detail ? `. Stderr: ${detail}` : ''}`,
            exitCode: code,
          });
        }
      });
    });
  }
}
