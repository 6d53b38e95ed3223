import { readFile, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import {
  SpatialGrid,
  boundsDiagonal,
  computeBounds,
  createMesh,
  decimateToBudget,
  encodePly,
  estimateNormals,
  orientNormals,
  readMesh,
  readPointCloud,
  transferColors,
  trimLowDensity,
} from '@photomesh/geometry'
import type { PipelineConfig } from '@photomesh/config'
import type { PointCloudArtifact, PointCloudMeshResult } from '@photomesh/types'
import type { Logger } from '../logger'
import { StageProcessError, tail } from '../errors'
import type { ProcessRunner } from '../process/runner'

type MeshSettings = PipelineConfig['mesh']

/** Output file names under the output directory. */
export const MESH_FILES = {
  orientedPoints: 'oriented_points.ply',
  poisson: 'poisson_raw.ply',
  mesh: 'mesh.ply',
} as const

/**
 * Point cloud → coloured triangle mesh.
 *
 * normals (PCA + propagation) → Poisson surface reconstruction (external)
 * → low-density trim → colour transfer → decimation to the triangle budget.
 */
export class PointCloudMesher {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly settings: MeshSettings,
    private readonly logger: Logger,
  ) {}

  /** Minimum point count for a cloud of this kind to be meshed. */
  minimumPoints(kind: PointCloudArtifact['kind']): number {
    // Dense clouds must exceed their minimum; sparse ones only reach it.
    return kind === 'sparse' ? this.settings.minSparsePoints : this.settings.minDensePoints + 1
  }

  async build(cloud: PointCloudArtifact, outputDir: string): Promise<PointCloudMeshResult> {
    const base = {
      path: 'point-cloud' as const,
      cloudKind: cloud.kind,
      inputPoints: 0,
      poissonVertices: 0,
      poissonTriangles: 0,
      trimmedVertices: 0,
      vertices: 0,
      triangles: 0,
      hasColors: false,
    }

    const points = readPointCloud(await readFile(cloud.path))
    const minimum = this.minimumPoints(cloud.kind)
    this.logger.info('mesh_input', { kind: cloud.kind, points: points.count, minimum })
    if (points.count < minimum) {
      return {
        ...base,
        inputPoints: points.count,
        success: false,
        error: `Too few points to mesh: ${points.count} in ${cloud.kind} cloud (need ${minimum})`,
      }
    }

    // Normals
    const radius = this.settings.normalRadiusFactor * boundsDiagonal(computeBounds(points.positions))
    if (!(radius > 0)) {
      return { ...base, inputPoints: points.count, success: false, error: 'Point cloud has zero extent' }
    }
    const params = { k: this.settings.normalNeighbors, radius }
    const grid = SpatialGrid.forCloud(points.positions)
    const normals = orientNormals(points, estimateNormals(points, params, grid), params, grid)

    const orientedPath = join(outputDir, MESH_FILES.orientedPoints)
    await writeFile(orientedPath, encodePly({ positions: points.positions, normals, colors: points.colors }))

    // Surface reconstruction
    const poissonPath = join(outputDir, MESH_FILES.poisson)
    const outcome = await this.runner.run({
      command: this.settings.poissonBinary,
      args: ['--in', orientedPath, '--out', poissonPath, '--depth', String(this.settings.poissonDepth), '--density'],
      cwd: outputDir,
      label: 'poisson',
    })
    const failure = StageProcessError.from('poisson', outcome)
    if (failure) {
      const stderr = tail(outcome.stderr)
      return {
        ...base,
        inputPoints: points.count,
        success: false,
        error: stderr || failure.message,
        exitCode: outcome.exitCode,
        stderr,
      }
    }

    const { mesh: raw, density } = readMesh(await readFile(poissonPath))
    const trimmed = density
      ? trimLowDensity(raw, density, this.settings.densityQuantile)
      : { mesh: raw, removedVertices: 0 }
    if (trimmed.mesh.triangleCount === 0) {
      return {
        ...base,
        inputPoints: points.count,
        poissonVertices: raw.vertexCount,
        poissonTriangles: raw.triangleCount,
        success: false,
        error: 'Surface reconstruction produced no triangles',
      }
    }

    // Colour, then simplify with colours carried along.
    const colors = transferColors(trimmed.mesh, points)
    const coloured = createMesh(trimmed.mesh.vertices, trimmed.mesh.indices, colors)
    const final = decimateToBudget(coloured, this.settings.maxTriangles)

    const meshPath = join(outputDir, MESH_FILES.mesh)
    await writeFile(meshPath, encodePly({ positions: final.vertices, colors: final.colors, indices: final.indices }))

    this.logger.info('mesh_written', {
      path: meshPath,
      vertices: final.vertexCount,
      triangles: final.triangleCount,
      trimmed: trimmed.removedVertices,
    })

    return {
      ...base,
      success: true,
      inputPoints: points.count,
      poissonVertices: raw.vertexCount,
      poissonTriangles: raw.triangleCount,
      trimmedVertices: trimmed.removedVertices,
      vertices: final.vertexCount,
      triangles: final.triangleCount,
      hasColors: points.colors !== undefined,
      meshPath,
    }
  }
}
