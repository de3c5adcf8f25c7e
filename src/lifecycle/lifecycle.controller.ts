import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  ParseBoolPipe,
  ParseIntPipe,
  Post,
  Put,
  Query,
  Res,
  StreamableFile,
  UseGuards,
} from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiParam, ApiQuery, ApiResponse, ApiSecurity, ApiTags } from '@nestjs/swagger';
import type { Response } from 'express';
import { CoordinatorCommandError } from '../coordinator/coordinator.errors';
import type { PlanFormat } from '../generator/plan.serializer';
import { ApiKeyGuard } from '../shared/guards/api-key.guard';
import { toTopologyOverrides } from '../topology/dto/topology.dto';
import type { Topology } from '../topology/interfaces';
import { InvalidTopologyError } from '../topology/topology.errors';
import { TopologyService } from '../topology/topology.service';
import { ClusterInspectorService } from './cluster-inspector.service';
import { AddWorkerDto, ConvergeRequestDto, RebalanceRequestDto, ResizeDto } from './dto/lifecycle-request.dto';
import {
  OperationReportDto,
  RebalanceStartedDto,
  RebalanceStatusDto,
} from './dto/lifecycle-response.dto';
import type { ClusterNodesView, OperationReport } from './interfaces';
import { UnknownWorkerError } from './lifecycle.errors';
import { LifecycleService } from './lifecycle.service';
import { RebalanceService, type StartedRebalance } from './rebalance.service';

const PLAN_FORMATS: PlanFormat[] = ['json', 'yaml'];

function isPlanFormat(value: string): value is PlanFormat {
  return PLAN_FORMATS.some((format) => format === value);
}

/**
 * A report refused before any side effect becomes a 400 carrying the violations.
 */
function unlessRejected(report: OperationReport): OperationReport {
  if (report.rejected) {
    throw new BadRequestException({
      statusCode: HttpStatus.BAD_REQUEST,
      error: 'Bad Request',
      code: report.rejected.code,
      message: 'Topology rejected',
      violations: report.rejected.violations,
    });
  }
  return report;
}

@ApiTags('Cluster')
@ApiSecurity('api-key')
@UseGuards(ApiKeyGuard)
@Controller('api/cluster')
export class LifecycleController {
  constructor(
    private readonly lifecycle: LifecycleService,
    private readonly inspector: ClusterInspectorService,
    private readonly rebalanceService: RebalanceService,
    private readonly topologyService: TopologyService,
  ) {}

  /**
   * POST /api/cluster/converge
   * Brings the cluster to the configured topology, with optional overrides
   */
  @Post('converge')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Converge the cluster',
    description:
      'Starts, probes and registers nodes that are missing and drains and removes nodes that are no longer declared. ' +
      'Per-node failures are reported, not raised; check `overall`.',
  })
  @ApiOkResponse({ type: OperationReportDto })
  @ApiResponse({ status: 400, description: 'Topology rejected before anything was touched.' })
  @ApiResponse({ status: 401, description: 'Unauthorized, API key is missing or invalid.' })
  async converge(@Body() dto: ConvergeRequestDto): Promise<OperationReport> {
    let topology: Topology;
    try {
      topology = this.topologyService.resolve(toTopologyOverrides(dto.topology ?? {}));
    } catch (error) {
      throw this.toHttpError(error);
    }
    const report = await this.lifecycle.converge(topology, {
      forceRemoval: dto.forceRemoval,
      rebalance: dto.rebalance,
    });
    return unlessRejected(report);
  }

  /**
   * POST /api/cluster/workers
   * Adds one worker at the next index
   */
  @Post('workers')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Add a worker', description: 'Converge of the current topology plus one worker.' })
  @ApiOkResponse({ type: OperationReportDto })
  @ApiResponse({ status: 400, description: 'The resulting topology is invalid.' })
  @ApiResponse({ status: 401, description: 'Unauthorized, API key is missing or invalid.' })
  async addWorker(@Body() dto: AddWorkerDto): Promise<OperationReport> {
    const report = await this.lifecycle.addWorker(
      {
        ...(dto.index !== undefined ? { index: dto.index } : {}),
        ...(dto.host !== undefined ? { host: dto.host } : {}),
        ...(dto.port !== undefined ? { port: dto.port } : {}),
      },
      { rebalance: dto.rebalance },
    );
    return unlessRejected(report);
  }

  /**
   * DELETE /api/cluster/workers/:name
   * Drains and removes one worker; `force=true` skips the drain
   */
  @Delete('workers/:name')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Remove a worker',
    description:
      'Drains the worker, removes it from the coordinator and stops it. With force=true the drain is skipped ' +
      'and the report carries a data-loss warning. The declared topology is not changed.',
  })
  @ApiParam({ name: 'name', example: 'worker-2' })
  @ApiQuery({ name: 'force', required: false, type: Boolean })
  @ApiOkResponse({ type: OperationReportDto })
  @ApiResponse({ status: 401, description: 'Unauthorized, API key is missing or invalid.' })
  @ApiResponse({ status: 404, description: 'No worker with that name.' })
  async removeWorker(
    @Param('name') name: string,
    @Query('force', new ParseBoolPipe({ optional: true })) force?: boolean,
  ): Promise<OperationReport> {
    try {
      return await this.lifecycle.removeWorker(name, { force: force ?? false });
    } catch (error) {
      throw this.toHttpError(error);
    }
  }

  /**
   * PUT /api/cluster/size
   * Grows or shrinks the worker set
   */
  @Put('size')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Resize the cluster', description: 'Shrinking drains and removes the highest indices.' })
  @ApiOkResponse({ type: OperationReportDto })
  @ApiResponse({ status: 400, description: 'The resulting topology is invalid.' })
  @ApiResponse({ status: 401, description: 'Unauthorized, API key is missing or invalid.' })
  async resize(@Body() dto: ResizeDto): Promise<OperationReport> {
    const report = await this.lifecycle.resize(dto.workerCount, {
      forceRemoval: dto.forceRemoval,
      rebalance: dto.rebalance,
    });
    return unlessRejected(report);
  }

  /**
   * GET /api/cluster/plan
   * Generated node definitions for the current topology, secrets masked
   */
  @Get('plan')
  @ApiOperation({ summary: 'Export the generated plan', description: 'JSON by default, or compose-style YAML.' })
  @ApiQuery({ name: 'format', required: false, enum: PLAN_FORMATS })
  @ApiResponse({ status: 200, description: 'The plan. The X-Plan-Hash header carries its hash.' })
  @ApiResponse({ status: 400, description: 'Unknown format or invalid current topology.' })
  @ApiResponse({ status: 401, description: 'Unauthorized, API key is missing or invalid.' })
  getPlan(@Query('format') format: string | undefined, @Res({ passthrough: true }) res: Response): string {
    const requested = format ?? 'json';
    if (!isPlanFormat(requested)) {
      throw new BadRequestException(`format must be one of: ${PLAN_FORMATS.join(', ')}`);
    }
    try {
      const document = this.inspector.exportPlan(requested);
      res.setHeader('Content-Type', document.contentType);
      res.setHeader('X-Plan-Hash', document.hash);
      return document.body;
    } catch (error) {
      throw this.toHttpError(error);
    }
  }

  /**
   * GET /api/cluster/nodes
   * Supervisor status merged with the coordinator's live node list
   */
  @Get('nodes')
  @ApiOperation({ summary: 'List cluster nodes' })
  @ApiResponse({ status: 200, description: 'Merged node view.' })
  @ApiResponse({ status: 401, description: 'Unauthorized, API key is missing or invalid.' })
  getNodes(): Promise<ClusterNodesView> {
    return this.inspector.describeNodes();
  }

  /**
   * GET /api/cluster/nodes/:name/logs
   */
  @Get('nodes/:name/logs')
  @ApiOperation({ summary: 'Stream node logs' })
  @ApiParam({ name: 'name', example: 'coordinator' })
  @ApiQuery({ name: 'tail', required: false, type: Number, description: 'Trailing lines only.' })
  @ApiResponse({ status: 200, description: 'Plain-text log stream.' })
  @ApiResponse({ status: 401, description: 'Unauthorized, API key is missing or invalid.' })
  @ApiResponse({ status: 404, description: 'No node with that name.' })
  async getNodeLogs(
    @Param('name') name: string,
    @Query('tail', new ParseIntPipe({ optional: true })) tail?: number,
  ): Promise<StreamableFile> {
    const stream = await this.inspector.nodeLogs(name, tail);
    if (!stream) {
      throw new NotFoundException(`No node named "${name}"`);
    }
    return new StreamableFile(stream, { type: 'text/plain; charset=utf-8' });
  }

  /**
   * POST /api/cluster/rebalance
   */
  @Post('rebalance')
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({ summary: 'Start a rebalance', description: 'Returns immediately with the background job id.' })
  @ApiResponse({ status: 202, type: RebalanceStartedDto, description: 'Rebalance started.' })
  @ApiResponse({ status: 401, description: 'Unauthorized, API key is missing or invalid.' })
  startRebalance(@Body() dto: RebalanceRequestDto): Promise<StartedRebalance> {
    const topology = this.lifecycle.currentTopology();
    return this.rebalanceService.start({
      strategy: dto.strategy,
      shardCountHint: topology.options.shardCountHint,
      workerCount: topology.workers.length,
    });
  }

  /**
   * GET /api/cluster/rebalance/:jobId
   */
  @Get('rebalance/:jobId')
  @ApiOperation({ summary: 'Get rebalance job state' })
  @ApiOkResponse({ type: RebalanceStatusDto })
  @ApiResponse({ status: 401, description: 'Unauthorized, API key is missing or invalid.' })
  @ApiResponse({ status: 404, description: 'Unknown job id.' })
  async getRebalance(@Param('jobId') jobId: string): Promise<RebalanceStatusDto> {
    try {
      return { jobId, state: await this.rebalanceService.status(jobId) };
    } catch (error) {
      if (error instanceof CoordinatorCommandError && !error.transient) {
        throw new NotFoundException(`Rebalance job ${jobId} not found`);
      }
      throw error;
    }
  }

  private toHttpError(error: unknown): unknown {
    if (error instanceof InvalidTopologyError) {
      return new BadRequestException({
        statusCode: HttpStatus.BAD_REQUEST,
        error: 'Bad Request',
        code: error.code,
        message: 'Topology rejected',
        violations: error.violations,
      });
    }
    if (error instanceof UnknownWorkerError) {
      return new NotFoundException(error.message);
    }
    return error;
  }
}
