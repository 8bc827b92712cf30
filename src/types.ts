// Type definitions for template-packer

// Output languages the packer can emit
export type OutputTarget = 'moonbit' | 'typescript';

// What to do when a single template cannot be read or decoded
export type ReadFailurePolicy = 'fail' | 'skip';

export interface PackerConfig {
  rootDir: string;
  source: string;
  output: string;
  extension: string;
  target: OutputTarget;
  functionName?: string;
  onReadError: ReadFailurePolicy;
}

// One matched file, as read from disk
export interface TemplateEntry {
  name: string;
  content: string;
}

// A template ready to be embedded in a double-quoted literal
export interface EscapedEntry {
  name: string;
  escaped: string;
}

export interface PackedTemplate extends TemplateEntry, EscapedEntry {}

export interface SkippedTemplate {
  name: string;
  reason: string;
}

export type PackResult =
  | { status: 'packed'; sourceDir: string; templates: PackedTemplate[]; skipped: SkippedTemplate[] }
  | { status: 'source-missing'; sourceDir: string };

export type GenerationResult =
  | { status: 'generated'; outputPath: string; count: number; skipped: SkippedTemplate[] }
  | { status: 'source-missing'; sourceDir: string };

export interface RenderOptions {
  functionName: string;
  // Source directory as written in the configuration
  source: string;
}
