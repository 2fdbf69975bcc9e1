import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  NotFoundException,
  Param,
  ParseIntPipe,
  Post,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import type { NodeRecord } from '../../infra/contracts/node-record.dto';
import { NODE_STORE, type NodeStore } from '../../infra/storage/node-store.interface';
import { NodeRpcService } from '../rpc/node-rpc.service';
import { NodeNotifyDto, NodeRpcCallDto, NodeRpcCallResponseDto } from './dto/node-rpc-call.dto';
import { NodeResponseDto } from './dto/node-response.dto';
import { NodeCommandsService } from './node-commands.service';

/**
 * Nodes API: registered nodes, their live connection state, and calls forwarded to them.
 */
@ApiTags('nodes')
@Controller('api/nodes')
export class NodesController {
  constructor(
    @Inject(NODE_STORE) private readonly nodeStore: NodeStore,
    private readonly nodeRpc: NodeRpcService,
    private readonly commands: NodeCommandsService,
  ) {}

  @Get()
  @ApiOperation({ summary: 'List registered nodes' })
  @ApiQuery({ name: 'uuid', required: false })
  @ApiResponse({ status: 200, type: [NodeResponseDto] })
  async list(@Query('uuid') uuid?: string): Promise<NodeResponseDto[]> {
    const records = await this.nodeStore.list(uuid ? { uuid } : undefined);
    return records.map((r) => this.toResponse(r));
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get one node with its connection state' })
  @ApiResponse({ status: 200, type: NodeResponseDto })
  @ApiResponse({ status: 404, description: 'Node not found' })
  async get(@Param('id', ParseIntPipe) id: number): Promise<NodeResponseDto> {
    const record = await this.nodeStore.findById(id);
    if (!record) {
      throw new NotFoundException('Node not found');
    }
    return { ...this.toResponse(record), pendingCalls: this.nodeRpc.pendingCalls(id) };
  }

  @Get(':id/rpc')
  @ApiOperation({ summary: 'List the RPC methods a connected node exposes' })
  @ApiResponse({ status: 404, description: 'Node not connected' })
  async getRpcMethods(@Param('id', ParseIntPipe) id: number) {
    return this.commands.getRpcMethods(id);
  }

  @Post(':id/rpc')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Forward a JSON-RPC call to a node and return its result' })
  @ApiResponse({ status: 200, type: NodeRpcCallResponseDto })
  @ApiResponse({ status: 404, description: 'Node not connected' })
  @ApiResponse({ status: 502, description: 'Node returned an error' })
  @ApiResponse({ status: 504, description: 'Node did not reply in time' })
  async call(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: NodeRpcCallDto,
  ): Promise<NodeRpcCallResponseDto> {
    const result = await this.commands.call(id, dto.method, dto.params ?? {}, dto.timeoutMs);
    return { result };
  }

  @Post(':id/notify')
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({ summary: 'Send a one-way notification to a node' })
  async notify(@Param('id', ParseIntPipe) id: number, @Body() dto: NodeNotifyDto) {
    await this.commands.notify(id, dto.method, dto.params ?? {});
    return { ok: true };
  }

  @Post(':id/config/refresh')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Ask a node to reload its configuration' })
  async refreshConfig(@Param('id', ParseIntPipe) id: number) {
    return { delivered: await this.commands.refreshConfig(id) };
  }

  @Post(':id/teleop-groups/:groupId/start')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Start a teleop group on a node' })
  async startTeleopGroup(
    @Param('id', ParseIntPipe) id: number,
    @Param('groupId', ParseIntPipe) groupId: number,
  ) {
    return this.commands.startTeleopGroup(id, groupId);
  }

  @Post(':id/teleop-groups/:groupId/stop')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Stop a teleop group on a node' })
  async stopTeleopGroup(
    @Param('id', ParseIntPipe) id: number,
    @Param('groupId', ParseIntPipe) groupId: number,
  ) {
    return this.commands.stopTeleopGroup(id, groupId);
  }

  private toResponse(record: NodeRecord): NodeResponseDto {
    return {
      id: record.id,
      uuid: record.uuid,
      connected: this.nodeRpc.isConnected(record.id),
      createdAt: record.createdAt.toISOString(),
      updatedAt: record.updatedAt.toISOString(),
    };
  }
}
