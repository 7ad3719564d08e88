import { ItemSource } from "@/lib/domain/models";
import { Settings } from "@/lib/config-loader";
import { logger as defaultLogger, type Logger } from "@/lib/infra/logger";
import { ArxivRssSource } from "@/lib/fetch/arxiv-rss-source";
import { GitHubSource } from "@/lib/fetch/github-source";
import { HfPapersSource } from "@/lib/fetch/hf-papers-source";
import { HfTrendingSource } from "@/lib/fetch/hf-trending-source";

export function buildSources(settings: Settings, logger: Logger = defaultLogger): ItemSource[] {
  const { sources, monitoring } = settings;
  const built: ItemSource[] = [];

  if (sources.arxiv.enabled) {
    built.push(
      new ArxivRssSource({
        categories: sources.arxiv.categories,
        maxItems: sources.arxiv.maxItems,
        filterByKeywords: sources.arxiv.filterByKeywords,
        keywords: monitoring.keywords,
        logger,
      }),
    );
  }
  if (sources.github.enabled) {
    built.push(
      new GitHubSource({
        token: settings.githubToken,
        maxItems: sources.github.maxItems,
        topics: sources.github.topics,
        keywords: sources.github.keywords,
        searchDays: sources.github.searchDays,
        minStars: sources.github.minStars,
        requestDelaySeconds: sources.github.requestDelay,
        logger,
      }),
    );
  }
  if (sources.huggingfacePapers.enabled) {
    built.push(
      new HfPapersSource({
        maxItems: sources.huggingfacePapers.maxItems,
        filterByKeywords: sources.huggingfacePapers.filterByKeywords,
        searchDays: sources.huggingfacePapers.searchDays,
        keywords: monitoring.keywords,
        logger,
      }),
    );
  }
  if (sources.huggingfaceTrending.enabled) {
    built.push(
      new HfTrendingSource({
        maxItems: sources.huggingfaceTrending.maxItems,
        maxDaysOld: sources.huggingfaceTrending.maxDaysOld,
        pipelineTag: sources.huggingfaceTrending.pipelineTag,
        logger,
      }),
    );
  }

  return built;
}
