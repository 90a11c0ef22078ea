/**
 * Scheduler Service
 *
 * Interval job scheduling for the application using toad-scheduler. Jobs
 * never overlap with themselves, and the outcome of the latest run of each
 * job is kept in memory for status reporting.
 *
 * @example
 * scheduler.scheduleJob('photo-sync', { minutes: 60 }, async () => {
 *   await photoSync.run()
 * })
 */
import type { IntervalConfig, JobRunInfo } from '@root/types/scheduler.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import { AsyncTask, SimpleIntervalJob, ToadScheduler } from 'toad-scheduler'

/** Handler function type for scheduled jobs */
export type JobHandler = (jobName: string) => Promise<void>

interface RegisteredJob {
  job: SimpleIntervalJob
  handler: JobHandler
  config: IntervalConfig
  lastRun: JobRunInfo | null
}

export class SchedulerService {
  private readonly scheduler: ToadScheduler
  private readonly jobs = new Map<string, RegisteredJob>()
  private readonly log: FastifyBaseLogger

  constructor(baseLog: FastifyBaseLogger) {
    this.log = createServiceLogger(baseLog, 'SCHEDULER')
    this.scheduler = new ToadScheduler()
    this.log.info('Scheduler service initialized')
  }

  /**
   * Wraps the handler so a failing run is logged and recorded instead of
   * reaching the scheduler
   */
  private async execute(name: string, handler: JobHandler): Promise<void> {
    try {
      this.log.debug(`Running scheduled job: ${name}`)
      await handler(name)
      this.recordRun(name, { time: new Date().toISOString(), status: 'completed' })
      this.log.debug(`Job ${name} completed successfully`)
    } catch (error) {
      this.log.error({ error }, `Error in job ${name}`)
      this.recordRun(name, {
        time: new Date().toISOString(),
        status: 'failed',
        error: error instanceof Error ? error.message : String(error),
      })
    }
  }

  private recordRun(name: string, info: JobRunInfo): void {
    const registered = this.jobs.get(name)
    if (registered) {
      registered.lastRun = info
    }
  }

  private createJob(
    name: string,
    config: IntervalConfig,
    handler: JobHandler,
  ): SimpleIntervalJob {
    const task = new AsyncTask(
      `${name}-task`,
      () => this.execute(name, handler),
      (error) => {
        this.log.error({ error }, `Job task error for ${name}`)
      },
    )

    return new SimpleIntervalJob(
      {
        ...config,
        runImmediately: config.runImmediately ?? false,
      },
      task,
      {
        id: name,
        preventOverrun: true,
      },
    )
  }

  /**
   * Registers a handler on an interval, replacing any job with the same name
   *
   * @returns true if the job was scheduled
   */
  scheduleJob(name: string, config: IntervalConfig, handler: JobHandler): boolean {
    try {
      if (this.jobs.has(name)) {
        this.scheduler.removeById(name)
      }

      const job = this.createJob(name, config, handler)
      this.scheduler.addSimpleIntervalJob(job)
      this.jobs.set(name, { job, handler, config, lastRun: null })

      this.log.info(`Job ${name} scheduled successfully`)
      return true
    } catch (error) {
      this.log.error({ error }, `Error scheduling job ${name}`)
      return false
    }
  }

  /**
   * Remove a job from the scheduler
   */
  unscheduleJob(name: string): boolean {
    if (!this.jobs.has(name)) {
      return false
    }
    this.scheduler.removeById(name)
    this.jobs.delete(name)
    this.log.info(`Job ${name} unscheduled successfully`)
    return true
  }

  /**
   * Run a job immediately, outside of its schedule
   *
   * @returns false when no job has the name
   */
  async runJobNow(name: string): Promise<boolean> {
    const registered = this.jobs.get(name)
    if (!registered) {
      return false
    }

    this.log.info(`Manually running job: ${name}`)
    await this.execute(name, registered.handler)
    return true
  }

  getLastRun(name: string): JobRunInfo | null {
    return this.jobs.get(name)?.lastRun ?? null
  }

  /**
   * Get a list of all registered job names
   */
  getActiveJobs(): string[] {
    return Array.from(this.jobs.keys())
  }

  /**
   * Stop the scheduler and all running jobs
   *
   * Should be called during application shutdown.
   */
  stop(): void {
    this.log.info('Stopping all scheduled jobs')
    this.scheduler.stop()
  }
}
