import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class NodeResponseDto {
  @ApiProperty({ example: 7 })
  id!: number;

  @ApiProperty({ example: 'b7e1c7a2-0000-4000-8000-000000000001' })
  uuid!: string;

  /** Whether a live connection is bound to this node right now. */
  @ApiProperty()
  connected!: boolean;

  @ApiPropertyOptional({ description: 'Calls still awaiting a reply (detail view only)' })
  pendingCalls?: number;

  @ApiProperty()
  createdAt!: string;

  @ApiProperty()
  updatedAt!: string;
}
