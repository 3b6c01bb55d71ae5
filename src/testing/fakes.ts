/**
 * In-process collaborators for exercising the orchestrator without real
 * documents or formats
 */

import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";
import type {
  BatchResult,
  ConversionContext,
  ConvertibleDocument,
  ConvertOptions,
  DocumentLoader,
  ExtensionRunner,
  LoadOptions,
  ProgressSink,
  SubDocument,
  TransformOptions,
  Transposer,
  Writer,
  WriterOptions,
  WriterRegistry,
} from "../types";
import { Logger, Tracker, type OutputFile } from "../utils";

export class FakeDocument implements ConvertibleDocument<FakeDocument> {
  disposed = false;
  body = "";
  soundProfile: string | undefined;
  saveError: Error | undefined;

  constructor(
    readonly name: string,
    private readonly pages = 1,
    private readonly subDocuments: SubDocument<FakeDocument>[] = [],
  ) {}

  static withParts(name: string, parts: FakeDocument[]): FakeDocument {
    return new FakeDocument(
      name,
      1,
      parts.map((part) => ({ name: part.name, document: part })),
    );
  }

  parts(): SubDocument<FakeDocument>[] {
    return this.subDocuments;
  }

  pageCount(): number {
    return this.pages;
  }

  setSoundProfile(profile: string): void {
    this.soundProfile = profile;
  }

  // Writes `native:name|body`
  async save(path: string): Promise<void> {
    if (this.saveError) throw this.saveError;
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, `native:${this.name}|${this.body || "-"}`);
  }

  dispose(): void {
    this.disposed = true;
  }
}

export class FakeLoader implements DocumentLoader<FakeDocument> {
  readonly loads: Array<{ path: string; options: LoadOptions }> = [];
  readonly loaded: FakeDocument[] = [];

  constructor(private readonly factories: Record<string, () => FakeDocument>) {}

  async load(path: string, options: LoadOptions): Promise<FakeDocument> {
    this.loads.push({ path, options });
    const factory = this.factories[path];
    if (!factory) {
      throw new Error(`no such document: ${path}`);
    }
    const document = factory();
    this.loaded.push(document);
    return document;
  }
}

/**
 * Writes `name|unit|page|dir_path|body`, "-" for anything absent
 */
export class FakeWriter implements Writer<FakeDocument> {
  constructor(
    readonly pageSegmented = false,
    readonly supportsParts = true,
    private readonly failWith?: Error,
  ) {}

  async write(document: FakeDocument, file: OutputFile, options: WriterOptions): Promise<void> {
    if (this.failWith) throw this.failWith;
    await file.write(
      [
        document.name,
        options.unit ?? "-",
        options.pageNumber ?? "-",
        file.getMeta("dir_path") ?? "-",
        document.body || "-",
      ].join("|"),
    );
  }
}

export class FakeRegistry implements WriterRegistry<FakeDocument> {
  constructor(private readonly writers: Record<string, Writer<FakeDocument>>) {}

  lookup(kind: string): Writer<FakeDocument> | undefined {
    return this.writers[kind];
  }
}

export class FakeTransposer implements Transposer<FakeDocument> {
  readonly applied: Array<{ document: string; options: TransformOptions }> = [];

  constructor(private readonly failWith?: Error) {}

  parseOptions(raw: unknown): TransformOptions {
    if (typeof raw !== "object" || raw === null || !("interval" in raw)) {
      throw new Error("interval required");
    }
    const interval = raw.interval;
    return {
      mode: "by_interval",
      direction: "up",
      transposeInterval: typeof interval === "number" ? interval : 0,
      transposeKeySignatures: true,
      transposeChordNames: true,
    };
  }

  apply(document: FakeDocument, options: TransformOptions): void {
    if (this.failWith) throw this.failWith;
    this.applied.push({ document: document.name, options });
  }
}

export class FakeExtensions implements ExtensionRunner<FakeDocument> {
  readonly performed: string[] = [];

  async perform(uri: URL, document: FakeDocument): Promise<void> {
    this.performed.push(uri.href);
    document.body = `extended by ${uri.pathname}`;
  }
}

export type ProgressEvent =
  | { type: "start" }
  | { type: "progress"; current: number; total: number; label: string }
  | { type: "finish"; result: BatchResult };

export class RecordingProgress implements ProgressSink {
  readonly events: ProgressEvent[] = [];

  start(): void {
    this.events.push({ type: "start" });
  }

  progress(current: number, total: number, label: string): void {
    this.events.push({ type: "progress", current, total, label });
  }

  finish(result: BatchResult): void {
    this.events.push({ type: "finish", result });
  }
}

export interface TestContextOptions {
  documents?: Record<string, () => FakeDocument>;
  writers?: Record<string, Writer<FakeDocument>>;
  transposer?: FakeTransposer;
  extensions?: FakeExtensions;
  options?: ConvertOptions;
  nativeKinds?: string[];
  signal?: AbortSignal;
}

export interface TestContext extends ConversionContext<FakeDocument> {
  loader: FakeLoader;
  progressEvents: RecordingProgress;
}

export function createTestContext(options: TestContextOptions = {}): TestContext {
  const loader = new FakeLoader(options.documents ?? {});
  const progress = new RecordingProgress();
  return {
    services: {
      loader,
      writers: new FakeRegistry(options.writers ?? { txt: new FakeWriter() }),
      transposer: options.transposer ?? new FakeTransposer(),
      extensions: options.extensions,
    },
    options: options.options ?? {},
    nativeKinds: new Set(options.nativeKinds ?? ["html"]),
    logger: new Logger("error"),
    tracker: new Tracker(),
    progress,
    signal: options.signal,
    loader,
    progressEvents: progress,
  };
}
