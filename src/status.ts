import { APP_VERSION } from "./config";

/** Counters for the most recent build. Reset at the start of each build. */
export interface BuildProgress {
  /** Documents returned by the document source. */
  documentsDiscovered: number;
  /** Documents that contributed at least one chunk. */
  documentsIndexed: number;
  /** Documents skipped (too small, no chunks, or failed). */
  documentsSkipped: number;
  /** Chunks embedded and stored. */
  chunksIndexed: number;
}

/**
 * Server lifecycle + indexing progress, exposed through /health.
 *
 * ready = true once an index is usable (built or warm-loaded).
 */
export interface ServerStatus {
  version: string;
  docsDir: string;
  indexDir: string;
  /** Embedding model identifier (empty before init). */
  modelName: string;
  /** Active transport: 'stdio' | 'http' | 'unknown'. */
  transport: string;
  ready: boolean;
  startedAt: string;
  /** ISO timestamp of the last completed build or load, if any. */
  lastBuildAt: string | null;
  building: BuildProgress;
}

/** Class wrapper around mutable status state; one instance per server process. */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      docsDir: initial?.docsDir ?? "",
      indexDir: initial?.indexDir ?? "",
      modelName: initial?.modelName ?? "",
      transport: initial?.transport ?? "unknown",
      ready: initial?.ready ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      lastBuildAt: initial?.lastBuildAt ?? null,
      building: initial?.building ?? StatusManager.emptyProgress(),
    };
  }

  private static emptyProgress(): BuildProgress {
    return { documentsDiscovered: 0, documentsIndexed: 0, documentsSkipped: 0, chunksIndexed: 0 };
  }

  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setDirs(docsDir: string, indexDir: string) {
    this.data.docsDir = docsDir;
    this.data.indexDir = indexDir;
  }

  public setModelName(name: string) {
    this.data.modelName = name;
  }

  /** Start counting a new build over `documents` inputs. */
  public beginBuild(documents: number) {
    this.data.building = { ...StatusManager.emptyProgress(), documentsDiscovered: documents };
  }

  public recordIndexed(chunks: number) {
    this.data.building.documentsIndexed++;
    this.data.building.chunksIndexed += chunks;
  }

  public recordSkipped() {
    this.data.building.documentsSkipped++;
  }

  /** An index became usable (transition ready=false -> true). */
  public markReady() {
    this.data.ready = true;
    this.data.lastBuildAt = new Date().toISOString();
  }

  /** Live reference to the current status (treat as read-only). */
  public getStatus(): ServerStatus {
    return this.data;
  }

  public toJSON() {
    return this.data;
  }
}
