import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsInt, IsNotEmpty, IsObject, IsOptional, IsString, Max, Min } from 'class-validator';

/** Request body for POST /api/nodes/:id/rpc. */
export class NodeRpcCallDto {
  @ApiProperty({ example: 'node.get_device_types' })
  @IsString()
  @IsNotEmpty()
  method!: string;

  @ApiPropertyOptional({ type: 'object', additionalProperties: true, example: {} })
  @IsOptional()
  @IsObject()
  params?: Record<string, unknown>;

  /** Overrides the default call timeout. */
  @ApiPropertyOptional({ example: 5000 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(600000)
  timeoutMs?: number;
}

/** Request body for POST /api/nodes/:id/notify. */
export class NodeNotifyDto {
  @ApiProperty({ example: 'node.update_config' })
  @IsString()
  @IsNotEmpty()
  method!: string;

  @ApiPropertyOptional({ type: 'object', additionalProperties: true, example: {} })
  @IsOptional()
  @IsObject()
  params?: Record<string, unknown>;
}

export class NodeRpcCallResponseDto {
  @ApiProperty({ description: 'Result payload returned by the node' })
  result!: unknown;
}
