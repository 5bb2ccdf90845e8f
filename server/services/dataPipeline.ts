import cron, { type ScheduledTask } from "node-cron";
import type { FPLBootstrap, FPLFixture } from "@shared/schema";
import { getConfig } from "../config";
import { buildSnapshot, type DatasetSnapshot } from "./entityDictionary";
import { FPLApiService } from "./fplApi";
import { DataRepository } from "./repositories/dataRepository";
import { SnapshotStore } from "./snapshotStore";

export type RefreshTrigger = "startup" | "manual" | "cron";

export interface PipelineStats {
  trigger: RefreshTrigger;
  startedAt: Date;
  completedAt: Date;
  durationMs: number;
  playersIngested: number;
  fixturesIngested: number;
  generationId: number | null;
  source: "api" | "repository" | null;
  status: "success" | "partial" | "failed";
  error?: string;
}

export interface SnapshotStatus {
  loaded: boolean;
  generationId: number | null;
  fetchedAt: string | null;
  currentGameweek: number | null;
  persons: number;
  groups: number;
  fixtures: number;
}

export interface PipelineOptions {
  bootstrap: boolean;
  schedule: string;
  timezone: string;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class DataPipeline {
  private static instance: DataPipeline;
  private cronTask: ScheduledTask | null = null;
  private lastRun?: PipelineStats;
  private inFlight: Promise<PipelineStats> | null = null;

  private constructor(
    private readonly repository: DataRepository,
    private readonly fplApi: FPLApiService,
    private readonly store: SnapshotStore,
    private readonly options: PipelineOptions,
  ) {}

  static getInstance(): DataPipeline {
    if (!DataPipeline.instance) {
      DataPipeline.instance = new DataPipeline(
        DataRepository.getInstance(),
        FPLApiService.getInstance(),
        SnapshotStore.getInstance(),
        getConfig().pipeline,
      );
    }
    return DataPipeline.instance;
  }

  static create(
    repository: DataRepository,
    deps: { fplApi?: FPLApiService; store?: SnapshotStore; options?: Partial<PipelineOptions> } = {},
  ): DataPipeline {
    return new DataPipeline(
      repository,
      deps.fplApi ?? FPLApiService.getInstance(),
      deps.store ?? SnapshotStore.create(),
      { ...getConfig().pipeline, ...deps.options },
    );
  }

  async initialise(): Promise<void> {
    if (this.options.bootstrap) {
      await this.runFullRefresh("startup").catch(error => {
        console.error("[pipeline] Initial bootstrap failed", error);
      });
    }

    if (this.options.schedule) {
      this.startCron(this.options.schedule);
    }
  }

  getLastRun(): PipelineStats | undefined {
    return this.lastRun;
  }

  getSnapshotStatus(): SnapshotStatus {
    const snapshot = this.store.peek();
    return {
      loaded: snapshot !== null,
      generationId: snapshot?.generationId ?? null,
      fetchedAt: snapshot?.fetchedAt.toISOString() ?? null,
      currentGameweek: snapshot?.currentGameweek ?? null,
      persons: snapshot?.persons.length ?? 0,
      groups: snapshot?.groups.length ?? 0,
      fixtures: snapshot?.fixtures.length ?? 0,
    };
  }

  /** Concurrent triggers share the refresh already running. */
  runFullRefresh(trigger: RefreshTrigger = "manual"): Promise<PipelineStats> {
    if (this.inFlight) {
      console.log(`[pipeline] Refresh already running; joining it (trigger=${trigger})`);
      return this.inFlight;
    }

    const run = this.refresh(trigger).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  stop(): void {
    this.cronTask?.stop();
    this.cronTask = null;
  }

  private async refresh(trigger: RefreshTrigger): Promise<PipelineStats> {
    const startedAt = new Date();
    console.log(`[pipeline] Running full refresh (trigger=${trigger})`);

    const finish = (stats: Omit<PipelineStats, "trigger" | "startedAt" | "completedAt" | "durationMs">): PipelineStats => {
      this.lastRun = {
        trigger,
        startedAt,
        completedAt: new Date(),
        durationMs: Date.now() - startedAt.getTime(),
        ...stats,
      };
      return this.lastRun;
    };

    let bootstrap: FPLBootstrap;
    let fixtures: FPLFixture[];
    try {
      const force = trigger === "manual" || trigger === "cron";
      [bootstrap, fixtures] = await Promise.all([
        this.fplApi.getBootstrapData({ force }),
        this.fplApi.getFixtures({ force }),
      ]);
    } catch (error) {
      console.error("[pipeline] Refresh failed", error);
      if (this.store.peek()) {
        finish({ playersIngested: 0, fixturesIngested: 0, generationId: null, source: null, status: "failed", error: errorMessage(error) });
        throw error;
      }
      return this.restoreFromRepository(error, finish);
    }

    let snapshot: DatasetSnapshot;
    try {
      snapshot = buildSnapshot({
        bootstrap,
        fixtures,
        generationId: this.store.nextGenerationId(),
        fetchedAt: new Date(),
      });
    } catch (error) {
      console.error("[pipeline] Snapshot rejected; keeping the current one", error);
      finish({ playersIngested: 0, fixturesIngested: 0, generationId: null, source: null, status: "failed", error: errorMessage(error) });
      throw error;
    }

    this.store.swap(snapshot);
    console.log(`[pipeline] Swapped to generation ${snapshot.generationId} (${snapshot.persons.length} players, ${snapshot.fixtures.length} fixtures)`);

    let status: PipelineStats["status"] = "success";
    let persistError: string | undefined;
    try {
      await this.persistRaw(bootstrap, fixtures, snapshot.fetchedAt);
    } catch (error) {
      status = "partial";
      persistError = errorMessage(error);
      console.warn("[pipeline] Failed to persist raw payloads", error);
    }

    const stats = finish({
      playersIngested: bootstrap.elements.length,
      fixturesIngested: fixtures.length,
      generationId: snapshot.generationId,
      source: "api",
      status,
      error: persistError,
    });
    console.log(`[pipeline] Full refresh complete in ${stats.durationMs}ms`);
    return stats;
  }

  private async persistRaw(bootstrap: FPLBootstrap, fixtures: FPLFixture[], fetchedAt: Date): Promise<void> {
    await Promise.all([
      this.repository.upsertFplPlayers(bootstrap.elements, fetchedAt),
      this.repository.upsertFplTeams(bootstrap.teams, fetchedAt),
      this.repository.upsertFplFixtures(fixtures, fetchedAt),
    ]);
  }

  private async restoreFromRepository(
    cause: unknown,
    finish: (stats: Omit<PipelineStats, "trigger" | "startedAt" | "completedAt" | "durationMs">) => PipelineStats,
  ): Promise<PipelineStats> {
    const raw = await this.repository.loadRawDataset().catch(error => {
      console.error("[pipeline] Could not read persisted payloads", error);
      return null;
    });

    if (!raw || raw.players.length === 0 || raw.teams.length === 0) {
      finish({ playersIngested: 0, fixturesIngested: 0, generationId: null, source: null, status: "failed", error: errorMessage(cause) });
      throw cause;
    }

    const snapshot = buildSnapshot({
      bootstrap: { elements: raw.players, teams: raw.teams, events: [] },
      fixtures: raw.fixtures,
      generationId: this.store.nextGenerationId(),
      fetchedAt: raw.fetchedAt ?? new Date(),
    });
    this.store.swap(snapshot);
    console.warn(`[pipeline] FPL API unavailable; serving persisted data as generation ${snapshot.generationId}`);

    return finish({
      playersIngested: raw.players.length,
      fixturesIngested: raw.fixtures.length,
      generationId: snapshot.generationId,
      source: "repository",
      status: "partial",
      error: errorMessage(cause),
    });
  }

  private startCron(schedule: string): void {
    if (this.cronTask) {
      this.cronTask.stop();
    }

    const options = {
      scheduled: true,
      timezone: this.options.timezone,
    } satisfies { scheduled?: boolean; timezone?: string };

    this.cronTask = cron.schedule(schedule, () => {
      this.runFullRefresh("cron").catch(error => {
        console.error("[pipeline] Scheduled refresh failed", error);
      });
    }, options);

    console.log(`[pipeline] Scheduled refresh configured (${schedule})`);
  }
}
