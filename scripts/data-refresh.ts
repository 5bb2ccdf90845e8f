import { DataPipeline } from "../server/services/dataPipeline";
import { shutdownDatabase } from "../server/db/client";

async function main(): Promise<void> {
  try {
    const pipeline = DataPipeline.getInstance();
    const result = await pipeline.runFullRefresh("manual");
    const snapshot = pipeline.getSnapshotStatus();
    console.log("Data refresh complete", {
      status: result.status,
      source: result.source,
      generationId: result.generationId,
      durationMs: result.durationMs,
      players: result.playersIngested,
      fixtures: result.fixturesIngested,
      currentGameweek: snapshot.currentGameweek,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error("Data refresh failed:", message);
    process.exitCode = 1;
  } finally {
    await shutdownDatabase();
  }
}

void main();
