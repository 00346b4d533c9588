import { readFileSync } from 'node:fs'
import path from 'node:path'
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander'

import { loadEpisplitConfig } from './config.js'
import { checkSourceFile } from './episodes/check.js'
import type { DetectorServices } from './episodes/detectors/index.js'
import { ConfigurationError } from './episodes/errors.js'
import { extractEpisodes } from './episodes/extract.js'
import { planEpisodeSplit } from './episodes/plan.js'
import {
  type NoDetectionPolicy,
  type SettingsOverrides,
  type SplitMode,
  type SplitSettings,
  resolveSplitSettings,
} from './episodes/settings.js'
import type { CutPlan, SplitProgress } from './episodes/types.js'
import { resolveLlmApiKeys } from './llm/generate-text.js'
import { createCachedSampler } from './media/cache.js'
import { createFfmpegSampler } from './media/ffmpeg.js'
import { type ProbeResult, probeSourceMedia } from './media/probe.js'
import type { MediaSampler } from './media/sampler.js'
import { parseBooleanEnv, resolveToolPath } from './run/env.js'
import { type SplitLog, createSplitLog } from './run/log.js'
import { buildPlanJson, formatCheckReport, formatPlanReport } from './run/report.js'
import { isRichTty, supportsColor } from './run/terminal.js'
import { createTmdbRuntimeService } from './services/runtime-metadata.js'
import { createTranscriptionService } from './services/transcription.js'
import { createLlmVisionService } from './services/vision.js'
import { createOscProgressController, splitProgressPercent } from './tty/osc-progress.js'
import { startSpinner } from './tty/spinner.js'

export type MediaBackend = {
  ffmpegPath: string
  probe: (filePath: string) => Promise<ProbeResult>
  createSampler: (filePath: string, log: SplitLog) => MediaSampler
}

export type RunCliContext = {
  env: Record<string, string | undefined>
  fetch: typeof fetch
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
  /** Replaces the ffmpeg/ffprobe backend (tests, embedding). */
  media?: MediaBackend | null
}

type SplitCliOptions = {
  mode?: SplitMode
  pattern?: string
  detectors?: string[]
  model?: string
  policy?: NoDetectionPolicy
  workers?: number
  window?: number
  runtimeMetadata?: boolean
  verbose?: boolean
}

type PlanCliOptions = SplitCliOptions & { json?: boolean }

type SplitCommandOptions = SplitCliOptions & {
  out?: string
  dryRun?: boolean
  seasonDir?: boolean
  json?: boolean
}

function readPackageVersion(): string {
  try {
    const raw = readFileSync(new URL('../package.json', import.meta.url), 'utf8')
    const parsed: unknown = JSON.parse(raw)
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed) {
      const { version } = parsed
      if (typeof version === 'string') return version
    }
  } catch {
    return '0.0.0'
  }
  return '0.0.0'
}

function parsePositiveInteger(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.')
  }
  return parsed
}

function parsePositiveNumber(value: string): number {
  const parsed = Number(value)
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number.')
  }
  return parsed
}

function parseMode(value: string): SplitMode {
  if (value === 'normal' || value === 'precision') return value
  throw new InvalidArgumentError('Expected normal or precision.')
}

function parsePolicy(value: string): NoDetectionPolicy {
  if (value === 'strict' || value === 'best-effort') return value
  throw new InvalidArgumentError('Expected strict or best-effort.')
}

function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean)
}

function addSplitOptions(command: Command): Command {
  return command
    .addOption(new Option('--mode <mode>', 'detection mode: normal or precision').argParser(parseMode))
    .option('--pattern <pattern>', 'precision boundary pattern, e.g. c-l-s or c-s-l')
    .option('--detectors <list>', 'comma-separated detectors (silence,black,scene,speech,vision,image-hash,audio-fingerprint,chapter)', parseList)
    .option('--model <id>', 'vision model id, e.g. ollama/qwen2.5vl:3b or openai/gpt-4o-mini')
    .addOption(new Option('--policy <policy>', 'when a window finds nothing: strict or best-effort').argParser(parsePolicy))
    .option('--workers <count>', 'windows analyzed concurrently (normal mode)', parsePositiveInteger)
    .option('--window <seconds>', 'half-width of each search window', parsePositiveNumber)
    .option('--runtime-metadata', 'look up episode runtimes on TMDB')
    .option('--no-runtime-metadata', 'never look up episode runtimes')
    .option('-v, --verbose', 'log every step to stderr')
}

function toOverrides(options: SplitCliOptions, seasonDirectory?: boolean): SettingsOverrides {
  return {
    mode: options.mode,
    pattern: options.pattern,
    detectors: options.detectors,
    model: options.model,
    policy: options.policy,
    workers: options.workers,
    runtimeMetadata: options.runtimeMetadata,
    windowSeconds: options.window,
    seasonDirectory,
  }
}

function requireTool(binary: string, env: Record<string, string | undefined>, envKey: string): string {
  const resolved = resolveToolPath(binary, env, envKey)
  if (!resolved) {
    throw new ConfigurationError(`Missing ${binary} (install it or set ${envKey})`)
  }
  return resolved
}

export function createFfmpegBackend(env: Record<string, string | undefined>): MediaBackend {
  const ffmpegPath = requireTool('ffmpeg', env, 'FFMPEG_PATH')
  const ffprobePath = requireTool('ffprobe', env, 'FFPROBE_PATH')
  return {
    ffmpegPath,
    probe: (filePath) => probeSourceMedia({ ffprobePath, inputPath: filePath }),
    createSampler: (filePath, log) => createFfmpegSampler({ ffmpegPath, inputPath: filePath, log }),
  }
}

function createDetectorServices({
  settings,
  env,
  fetchImpl,
}: {
  settings: SplitSettings
  env: Record<string, string | undefined>
  fetchImpl: typeof fetch
}): DetectorServices {
  const vision = settings.detectors.vision
    ? createLlmVisionService({
        modelId: settings.vision.model,
        apiKeys: resolveLlmApiKeys(env),
        ollamaHost: settings.vision.ollamaHost,
        timeoutMs: settings.retry.timeoutMs,
        fetchImpl,
      })
    : null
  const transcription = settings.detectors.speech
    ? createTranscriptionService({
        modelId: settings.speech.model,
        apiKey: env.OPENAI_API_KEY?.trim() || null,
        baseUrl: settings.speech.baseUrl,
        timeoutMs: settings.retry.timeoutMs,
        fetchImpl,
      })
    : null
  return { vision, transcription }
}

type ProgressUi = {
  update: (progress: SplitProgress) => void
  done: () => void
}

function createProgressUi({ ctx, enabled }: { ctx: RunCliContext; enabled: boolean }): ProgressUi {
  const richTty = isRichTty(ctx.stderr)
  const spinner = startSpinner({ text: 'Probing…', enabled: enabled && richTty, stream: ctx.stderr })
  const osc = createOscProgressController({
    env: ctx.env,
    isTty: richTty,
    label: 'Splitting…',
    write: (text) => {
      if (enabled) ctx.stderr.write(text)
    },
  })
  return {
    update: (progress) => {
      spinner.setText(`${progress.phase}: ${progress.label}`)
      osc.setPercent(progress.label, splitProgressPercent(progress))
    },
    done: () => {
      spinner.stopAndClear()
      osc.clear()
    },
  }
}

async function runPlan({
  filePath,
  options,
  seasonDirectory,
  ctx,
}: {
  filePath: string
  options: SplitCliOptions
  seasonDirectory?: boolean
  ctx: RunCliContext
}): Promise<{ plan: CutPlan; settings: SplitSettings; media: MediaBackend; log: SplitLog; ui: ProgressUi }> {
  const { config } = loadEpisplitConfig({ env: ctx.env })
  const settings = resolveSplitSettings({
    config,
    env: ctx.env,
    overrides: toOverrides(options, seasonDirectory),
  })
  const verbose = Boolean(options.verbose) || parseBooleanEnv(ctx.env.EPISPLIT_VERBOSE) === true
  const log = createSplitLog({ enabled: verbose, stream: ctx.stderr })
  const media = ctx.media ?? createFfmpegBackend(ctx.env)
  const services = createDetectorServices({ settings, env: ctx.env, fetchImpl: ctx.fetch })
  const runtime = settings.runtimeMetadata
    ? createTmdbRuntimeService({
        apiKey: ctx.env.TMDB_API_KEY?.trim() || null,
        readAccessToken: ctx.env.TMDB_READ_ACCESS_TOKEN?.trim() || null,
        fetchImpl: ctx.fetch,
      })
    : null

  const ui = createProgressUi({ ctx, enabled: !verbose })
  try {
    const plan = await planEpisodeSplit({
      filePath,
      settings,
      deps: {
        probe: media.probe,
        sampler: createCachedSampler(media.createSampler(filePath, log)),
        services,
        runtime,
        log,
      },
      hooks: { onProgress: ui.update },
    })
    return { plan, settings, media, log, ui }
  } catch (error) {
    ui.done()
    throw error
  }
}

function buildProgram(ctx: RunCliContext): Command {
  const program = new Command()
  const color = supportsColor(ctx.stdout, ctx.env)

  program
    .name('episplit')
    .description('Find episode boundaries inside combined video files and split them losslessly.')
    .version(readPackageVersion())
    .exitOverride()
    .configureOutput({
      writeOut: (text) => ctx.stdout.write(text),
      writeErr: (text) => ctx.stderr.write(text),
    })

  addSplitOptions(
    program
      .command('plan')
      .description('detect boundaries and print the cut plan without writing anything')
      .argument('<file>', 'combined multi-episode video')
      .option('--json', 'print the plan as JSON')
  ).action(async (file: string, options: PlanCliOptions) => {
    const { plan, ui } = await runPlan({ filePath: file, options, ctx })
    ui.done()
    ctx.stdout.write(
      options.json ? `${JSON.stringify(buildPlanJson(plan), null, 2)}\n` : formatPlanReport({ plan, color })
    )
  })

  addSplitOptions(
    program
      .command('split')
      .description('detect boundaries and write one file per episode (stream copy)')
      .argument('<file>', 'combined multi-episode video')
      .option('-o, --out <dir>', 'output directory (defaults to the source directory)')
      .option('--season-dir', 'write episodes into a "Season NN" subdirectory')
      .option('--dry-run', 'resolve output paths without running ffmpeg')
      .option('--json', 'print the result as JSON')
  ).action(async (file: string, options: SplitCommandOptions) => {
    const { plan, settings, media, log, ui } = await runPlan({
      filePath: file,
      options,
      seasonDirectory: options.seasonDir,
      ctx,
    })
    try {
      const outputs = await extractEpisodes({
        plan,
        ffmpegPath: media.ffmpegPath,
        outputDir: options.out ?? path.dirname(file),
        seasonDirectory: settings.naming.seasonDirectory,
        dryRun: Boolean(options.dryRun),
        log,
        onEpisode: (completed, total, episode) =>
          ui.update({ phase: 'extract', completed, total, label: episode.range.filename }),
      })
      ui.done()
      ctx.stdout.write(
        options.json
          ? `${JSON.stringify(buildPlanJson(plan, outputs), null, 2)}\n`
          : formatPlanReport({ plan, color, outputs })
      )
    } catch (error) {
      ui.done()
      throw error
    }
  })

  program
    .command('check')
    .description('report whether a file looks like it holds several episodes')
    .argument('<file>', 'video file')
    .action(async (file: string) => {
      const { config } = loadEpisplitConfig({ env: ctx.env })
      const settings = resolveSplitSettings({ config, env: ctx.env })
      const media = ctx.media ?? createFfmpegBackend(ctx.env)
      const probed = await media.probe(file)
      const check = checkSourceFile({
        filePath: file,
        durationSeconds: probed.durationSeconds,
        chapters: probed.chapters,
        settings,
      })
      ctx.stdout.write(formatCheckReport({ filePath: file, check, color }))
    })

  return program
}

export async function runCli(argv: string[], ctx: RunCliContext): Promise<void> {
  const program = buildProgram(ctx)
  try {
    await program.parseAsync(argv, { from: 'user' })
  } catch (error) {
    // --help and --version surface as a zero exit code.
    if (error instanceof CommanderError && error.exitCode === 0) return
    throw error
  }
}
