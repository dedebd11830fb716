export class LaserPrepError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Raised when an input file does not carry the `.dxf` extension. */
export class FileTypeError extends LaserPrepError {
  constructor(
    public readonly extension: string,
    public readonly filePath: string,
  ) {
    super(`Unsupported file extension ${extension} on input file ${filePath}!`);
  }
}

export class ConversionError extends LaserPrepError {
  constructor(
    public readonly dxfPath: string,
    public readonly svgPath: string,
    public readonly exitCode: number | null,
    detail: string,
  ) {
    super(`Failed to convert ${dxfPath} to ${svgPath}: ${detail}`);
  }
}

export class SvgParseError extends LaserPrepError {
  constructor(public readonly svgPath: string, detail: string, options?: ErrorOptions) {
    super(`Failed to parse SVG file ${svgPath}: ${detail}`, options);
  }
}

export class SettingsError extends LaserPrepError {}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
