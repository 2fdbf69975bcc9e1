import { Controller, Get } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { NodeRpcService } from './modules/rpc/node-rpc.service';

/**
 * Root application controller.
 * Health check for load balancers and monitoring.
 */
@ApiTags('health')
@Controller()
export class AppController {
  constructor(private readonly nodeRpc: NodeRpcService) {}

  @Get('health')
  @ApiOperation({
    summary: 'Health check',
    description: 'Returns ok while the service is running, with the number of connected nodes.',
  })
  @ApiResponse({
    status: 200,
    description: 'Service is healthy',
    schema: {
      properties: {
        ok: { type: 'boolean', example: true },
        connectedNodes: { type: 'integer', example: 2 },
      },
      type: 'object',
    },
  })
  getHealth() {
    return { ok: true, connectedNodes: this.nodeRpc.connectedNodeKeys().length };
  }
}
