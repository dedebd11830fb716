export type StrokeStyle = { color: string; width: number };

export type InkscapeCliStyle = 'legacy' | 'modern';

export type ConversionResult =
    | { status: 'success' }
    | { status: 'error'; message: string; exitCode: number | null };

export interface VectorConverter {
    convert: (dxfPath: string, svgPath: string) => Promise<ConversionResult>;
}
