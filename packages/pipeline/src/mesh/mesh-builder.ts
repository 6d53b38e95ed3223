import type { PipelineConfig } from '@photomesh/config'
import type { NeuralMeshResult, PointCloudArtifact, PointCloudMeshResult } from '@photomesh/types'
import type { Logger } from '../logger'
import type { ProcessRunner } from '../process/runner'
import { NeuralMesher } from './neural-mesher'
import { PointCloudMesher } from './point-cloud-mesher'

/** The two ways the pipeline turns its inputs into a mesh. */
export class MeshBuilder {
  private readonly pointCloud: PointCloudMesher
  private readonly neural: NeuralMesher

  constructor(runner: ProcessRunner, config: PipelineConfig, logger: Logger) {
    this.pointCloud = new PointCloudMesher(runner, config.mesh, logger.child({ component: 'mesher' }))
    this.neural = new NeuralMesher(runner, config.neural, logger.child({ component: 'neural' }))
  }

  /** Surface reconstruction over a sparse or dense cloud. */
  fromPointCloud(cloud: PointCloudArtifact, outputDir: string): Promise<PointCloudMeshResult> {
    return this.pointCloud.build(cloud, outputDir)
  }

  /** Neural reconstruction straight from (ideally background-free) images. */
  fromImages(imagePaths: readonly string[], outputDir: string): Promise<NeuralMeshResult> {
    return this.neural.build(imagePaths, outputDir)
  }
}
