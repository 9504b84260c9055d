import { loggers } from '../config/logger';
import { getErrorMessage } from '../lib/errors';
import type { DispatchResult, TargetPlatform } from '../scraper/dispatcher';
import type { Review, ScrapeSnapshot, ScrapeTargets, SnapshotStatus } from '../types';

const log = loggers.scheduler;

/** The slice of the dispatcher the scheduler drives. */
export type TargetScraper = {
  scrapeTarget(platform: TargetPlatform, input: string): Promise<DispatchResult>;
  scrapeUrl(url: string): Promise<DispatchResult>;
};

type SnapshotReviews = ScrapeSnapshot['reviews'];

type Job = {
  key: keyof SnapshotReviews;
  label: string;
  run: () => Promise<DispatchResult>;
};

export function emptySnapshot(): ScrapeSnapshot {
  return {
    timestamp: null,
    status: 'no_data',
    reviews: { yelp: [], amazon: [], walmart: [], universal: [] },
    errors: [],
  };
}

export function hasTargets(targets: ScrapeTargets): boolean {
  return Boolean(targets.yelp || targets.amazon || targets.walmart || targets.url);
}

function countReviews(reviews: SnapshotReviews): number {
  return Object.values(reviews).reduce((sum, list) => sum + list.length, 0);
}

function statusOf(errors: string[], total: number): SnapshotStatus {
  if (!errors.length) return 'success';
  return total > 0 ? 'partial_success' : 'failed';
}

/**
 * Runs target scrapes now or on a fixed interval and keeps the most recent
 * snapshot in memory. A background run is scheduled only after the previous
 * one finished, so runs never overlap.
 */
export class ScrapeScheduler {
  private snapshot: ScrapeSnapshot = emptySnapshot();
  private timer: NodeJS.Timeout | null = null;
  private schedule: { targets: ScrapeTargets; intervalSeconds: number } | null = null;
  private generation = 0;

  constructor(
    private readonly scraper: TargetScraper,
    private readonly now: () => Date = () => new Date(),
  ) {}

  latest(): ScrapeSnapshot {
    return this.snapshot;
  }

  isRunning(): boolean {
    return this.schedule !== null;
  }

  intervalSeconds(): number | undefined {
    return this.schedule?.intervalSeconds;
  }

  async runOnce(targets: ScrapeTargets): Promise<ScrapeSnapshot> {
    this.snapshot = await this.collect(targets);
    return this.snapshot;
  }

  private async collect(targets: ScrapeTargets): Promise<ScrapeSnapshot> {
    const reviews: SnapshotReviews = { yelp: [], amazon: [], walmart: [], universal: [] };
    const errors: string[] = [];

    for (const job of this.jobsFor(targets)) {
      try {
        const result = await job.run();
        reviews[job.key] = result.reviews;
        log.info({ target: job.key, count: result.reviews.length, method: result.method }, 'target scraped');
      } catch (err) {
        const message = `${job.label} scraping failed: ${getErrorMessage(err)}`;
        log.error({ target: job.key, err: getErrorMessage(err) }, 'target scrape failed');
        errors.push(message);
      }
    }

    return {
      timestamp: this.now().toISOString(),
      status: statusOf(errors, countReviews(reviews)),
      reviews,
      errors,
    };
  }

  /** Repeat `runOnce` every `intervalSeconds` until `stop()`; replaces any running schedule. */
  start(targets: ScrapeTargets, intervalSeconds: number): void {
    this.stop();
    this.schedule = { targets, intervalSeconds };
    log.info({ intervalSeconds }, 'background scraping started');
    this.scheduleNext(this.generation);
  }

  stop(): boolean {
    const wasRunning = this.schedule !== null;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.schedule = null;
    this.generation += 1;
    if (wasRunning) log.info('background scraping stopped');
    return wasRunning;
  }

  /** Store reviews scraped outside a scheduled run (universal and search requests). */
  recordUniversal(reviews: Review[]): void {
    const merged = { ...this.snapshot.reviews, universal: reviews };
    this.snapshot = {
      ...this.snapshot,
      timestamp: this.now().toISOString(),
      status: statusOf(this.snapshot.errors, countReviews(merged)),
      reviews: merged,
    };
  }

  private jobsFor(targets: ScrapeTargets): Job[] {
    const jobs: Job[] = [];
    const { yelp, amazon, walmart, url } = targets;
    if (yelp) jobs.push({ key: 'yelp', label: 'Yelp', run: () => this.scraper.scrapeTarget('yelp', yelp) });
    if (amazon) jobs.push({ key: 'amazon', label: 'Amazon', run: () => this.scraper.scrapeTarget('amazon', amazon) });
    if (walmart) jobs.push({ key: 'walmart', label: 'Walmart', run: () => this.scraper.scrapeTarget('walmart', walmart) });
    if (url) jobs.push({ key: 'universal', label: 'URL', run: () => this.scraper.scrapeUrl(url) });
    return jobs;
  }

  private scheduleNext(generation: number): void {
    const current = this.schedule;
    if (!current || generation !== this.generation) return;

    this.timer = setTimeout(() => {
      this.timer = null;
      this.tick(generation, current.targets).catch((err: unknown) => {
        log.error({ err: getErrorMessage(err) }, 'background scrape crashed');
      });
    }, current.intervalSeconds * 1000);
    this.timer.unref();
  }

  private async tick(generation: number, targets: ScrapeTargets): Promise<void> {
    if (generation !== this.generation) return;
    const snapshot = await this.collect(targets);
    // Stopped or restarted while scraping: the result belongs to an old schedule.
    if (generation !== this.generation) return;
    this.snapshot = snapshot;
    this.scheduleNext(generation);
  }
}
