import { JobSource, qualifyJobId } from '../sources';
import { JobPosting } from '../types/job';
import { Config } from '../config';
import { JobFamilyDefinition } from '../config/job-families';
import { JobFilter } from '../filters/job-filter';
import { formatExperienceWindow } from '../filters/experience';
import { normalizePosting } from './normalize';
import { logger } from '../utils/logger';
import { Sleep, sleep as defaultSleep } from '../utils/sleep';

export interface SourceStats {
  fetched: number;
  duplicates: number;
  filteredExperience: number;
  filteredSkills: number;
  kept: number;
}

export interface FamilyResult {
  family: string;
  jobs: JobPosting[];
  stats: Record<string, SourceStats>;
}

export interface JobFamilyDeps {
  sleep?: Sleep;
  now?: () => Date;
}

function emptyStats(): SourceStats {
  return { fetched: 0, duplicates: 0, filteredExperience: 0, filteredSkills: 0, kept: 0 };
}

/**
 * Scrapes one target role across every source
 * Sources are paged until an empty page (end of results or a failed call,
 * which the adapters report identically) or the configured page cap.
 */
export class JobFamily {
  private filter: JobFilter;
  private sleep: Sleep;
  private now: () => Date;

  constructor(
    readonly definition: JobFamilyDefinition,
    private sources: JobSource[],
    private config: Config,
    deps: JobFamilyDeps = {}
  ) {
    this.filter = new JobFilter(config.experience, definition.skillGate);
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
  }

  get label(): string {
    return this.definition.label;
  }

  async scrapeJobs(): Promise<FamilyResult> {
    const jobs: JobPosting[] = [];
    const seenJobIds = new Set<string>();
    const stats: Record<string, SourceStats> = {};
    const experienceRequired = formatExperienceWindow(this.config.experience);

    logger.info(`Scraping job family: ${this.label}`, {
      searchTerms: this.definition.searchTerms,
      skillGate: this.definition.skillGate
        ? `${this.definition.skillGate.minMatches}+ of ${this.definition.skillGate.keywords.length} keywords`
        : undefined,
    });

    for (const searchTerm of this.definition.searchTerms) {
      for (const source of this.sources) {
        const sourceStats = stats[source.name] ?? emptyStats();
        stats[source.name] = sourceStats;

        for (let page = 1; page <= this.config.maxPagesPerSource; page++) {
          if (page > 1) {
            await this.sleep(source.pageDelayMs);
          }

          const postings = await source.fetchJobs(searchTerm, page);
          if (postings.length === 0) {
            logger.debug(`No more postings from ${source.tag}`, { searchTerm, page });
            break;
          }
          sourceStats.fetched += postings.length;

          for (const posting of postings) {
            const qualifiedId = qualifyJobId(source, posting.jobId);

            if (seenJobIds.has(qualifiedId)) {
              sourceStats.duplicates++;
              continue;
            }
            seenJobIds.add(qualifiedId);

            const rejection = this.filter.rejectionReason(posting);
            if (rejection === 'experience') {
              sourceStats.filteredExperience++;
              continue;
            }
            if (rejection === 'skills') {
              sourceStats.filteredSkills++;
              continue;
            }

            jobs.push(normalizePosting(posting, {
              qualifiedId,
              source: source.name,
              jobFamily: this.label,
              experienceRequired,
              scrapedAt: this.now(),
            }));
            sourceStats.kept++;
          }
        }
      }
    }

    logger.info(`Job family ${this.label} completed`, { total: jobs.length, stats });
    return { family: this.label, jobs, stats };
  }
}

export function createJobFamilies(
  config: Config,
  sources: JobSource[],
  deps: JobFamilyDeps = {}
): JobFamily[] {
  return config.jobFamilies.map(definition => new JobFamily(definition, sources, config, deps));
}
