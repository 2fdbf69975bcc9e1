import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsNotEmpty, IsObject, IsString, Min } from 'class-validator';

/** Request body for POST /api/devices/test. */
export class DeviceTestDto {
  @ApiProperty({ example: 1 })
  @IsInt()
  @Min(1)
  node_id!: number;

  @ApiProperty({ example: 'robot' })
  @IsString()
  @IsNotEmpty()
  category!: string;

  @ApiProperty({ example: 'RealMan' })
  @IsString()
  @IsNotEmpty()
  type!: string;

  @ApiProperty({ type: 'object', additionalProperties: true, example: { ip: '192.168.1.100', port: 8080 } })
  @IsObject()
  config!: Record<string, unknown>;
}

/** Query for endpoints addressed to one node (?node_id=). */
export class NodeIdQueryDto {
  @ApiProperty({ example: 1 })
  @Type(() => Number)
  @IsInt()
  @Min(1)
  node_id!: number;
}
