import { access } from 'node:fs/promises'
import { join } from 'node:path'
import type { PipelineConfig } from '@photomesh/config'
import type { NeuralMeshResult } from '@photomesh/types'
import type { Logger } from '../logger'
import { StageProcessError, tail } from '../errors'
import type { ProcessOutcome, ProcessRunner } from '../process/runner'
import { openVirtualDisplay } from '../process/virtual-display'
import { listFilesRecursive } from '../workspace/layout'

type NeuralSettings = PipelineConfig['neural']

/** Where the model's CLI may live, relative to its checkout. */
export const ENTRYPOINT_CANDIDATES = ['run.py', join('scripts', 'run.py'), join('inference', 'run.py')]

interface Attempt {
  format: 'glb' | 'obj'
  bakeTexture: boolean
}

/**
 * Single-image neural reconstruction through the model's command line.
 *
 * The first attempt asks for a textured GLB. When texture baking trips over
 * tensors on mixed devices, one more attempt asks for a plain OBJ without
 * baking. Every attempt runs inside its own virtual display session.
 */
export class NeuralMesher {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly settings: NeuralSettings,
    private readonly logger: Logger,
  ) {}

  /** First existing entry point under the model directory. */
  async findEntrypoint(): Promise<string | undefined> {
    for (const candidate of ENTRYPOINT_CANDIDATES) {
      const path = join(this.settings.triposrDir, candidate)
      try {
        await access(path)
        return path
      } catch {
        continue
      }
    }
    return undefined
  }

  async build(imagePaths: readonly string[], outputDir: string): Promise<NeuralMeshResult> {
    const base = { path: 'neural' as const, outputDir, files: [], textured: false, attempts: 0, display: 'egl' as const }

    if (imagePaths.length === 0) {
      return { ...base, success: false, error: 'No input images provided to the model' }
    }
    const entry = await this.findEntrypoint()
    if (!entry) {
      return {
        ...base,
        success: false,
        error: `Model entry point not found under ${this.settings.triposrDir}`,
      }
    }

    const plan: Attempt[] = [{ format: 'glb', bakeTexture: this.settings.bakeTexture }]
    for (let i = 0; i < plan.length; i++) {
      const attempt = plan[i]
      if (!attempt) break

      const display = await openVirtualDisplay(
        this.runner,
        {
          binary: this.settings.xvfbBinary,
          display: this.settings.display,
          startupMs: this.settings.displayStartupMs,
        },
        this.logger,
      )

      let outcome: ProcessOutcome
      try {
        outcome = await this.runner.run({
          command: this.settings.pythonBinary,
          args: [
            entry,
            ...imagePaths,
            '--output-dir', outputDir,
            '--model-save-format', attempt.format,
            ...(attempt.bakeTexture ? ['--bake-texture'] : []),
          ],
          cwd: this.settings.triposrDir,
          env: display.env,
          label: 'triposr',
        })
      } finally {
        await display.stop()
      }

      const failure = StageProcessError.from('triposr', outcome)
      if (!failure) {
        const files = await listFilesRecursive(outputDir)
        this.logger.info('model_written', { files: files.length, format: attempt.format })
        return {
          ...base,
          success: true,
          files,
          format: attempt.format,
          textured: attempt.bakeTexture,
          attempts: i + 1,
          display: display.mode,
        }
      }

      if (failure.kind === 'device-mismatch' && plan.length === 1) {
        this.logger.warn('model_retry_without_texture', { reason: failure.message })
        plan.push({ format: 'obj', bakeTexture: false })
        continue
      }

      const stderr = tail(outcome.stderr)
      return {
        ...base,
        success: false,
        error: stderr || failure.message,
        exitCode: outcome.exitCode,
        stderr,
        attempts: i + 1,
        display: display.mode,
      }
    }

    // Unreachable: the loop returns on every path of its last attempt.
    return { ...base, success: false, error: 'Model produced no result' }
  }
}
