import { SeenItemStore } from "@/lib/cache/seen-item-store";
import { parseBoundedInt, RuntimeOptionInput, resolveSettings } from "../config";
import { CommandResult, fieldLine, successLine } from "../output";

export interface ListCommandOptions extends RuntimeOptionInput {
  source?: string;
  limit?: number;
}

export interface PruneCommandOptions extends RuntimeOptionInput {
  days?: number;
}

function openStore(options: RuntimeOptionInput): SeenItemStore {
  return new SeenItemStore(resolveSettings(options).paths.artifactsDir);
}

export async function executeStatsCommand(options: RuntimeOptionInput, store = openStore(options)): Promise<CommandResult> {
  const stats = await store.getStats();
  const sources = Object.entries(stats.bySource).sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));

  const lines = [successLine("seen items"), fieldLine("total", stats.total)];
  for (const [source, count] of sources) {
    lines.push(`  - ${source}: ${count}`);
  }

  return {
    payload: { ok: true, total_seen: stats.total, by_source: stats.bySource },
    lines,
  };
}

export async function executeListCommand(options: ListCommandOptions, store = openStore(options)): Promise<CommandResult> {
  const limit = options.limit === undefined ? 20 : parseBoundedInt("limit", options.limit, 1, 1000);
  const artifacts = await store.listArtifacts({ source: options.source || undefined, limit });

  const lines = [successLine(`${artifacts.length} recent items`)];
  for (const artifact of artifacts) {
    const score =
      artifact.relevanceChecked && artifact.relevanceScore !== undefined ? ` [${artifact.relevanceScore.toFixed(2)}]` : "";
    lines.push(`  - ${artifact.dateSeen} ${artifact.source}${score} ${artifact.title}`);
    lines.push(`    ${artifact.url}`);
  }

  return {
    payload: {
      ok: true,
      items: artifacts.map((artifact) => ({
        title: artifact.title,
        url: artifact.url,
        source: artifact.source,
        type: artifact.type,
        date_seen: artifact.dateSeen,
        relevance_checked: artifact.relevanceChecked,
        is_relevant: artifact.isRelevant,
        relevance_score: artifact.relevanceScore,
        artifact_file: artifact.artifactFile,
      })),
    },
    lines,
  };
}

export async function executePruneCommand(options: PruneCommandOptions, store = openStore(options)): Promise<CommandResult> {
  const days = options.days === undefined ? 90 : parseBoundedInt("days", options.days, 1, 3650);
  const removed = await store.pruneOld(days);
  return {
    payload: { ok: true, days, removed },
    lines: [successLine(`removed ${removed} items older than ${days} days`)],
  };
}
