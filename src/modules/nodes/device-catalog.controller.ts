import { Body, Controller, Get, HttpCode, HttpStatus, Post, Query } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { DeviceTestDto, NodeIdQueryDto } from './dto/device-test.dto';
import { NodeCommandsService } from './node-commands.service';

/**
 * Device and teleop-group type catalogs. Each node reports what its drivers support,
 * so every endpoint is addressed to one node via ?node_id=.
 */
@ApiTags('devices')
@Controller('api')
export class DeviceCatalogController {
  constructor(private readonly commands: NodeCommandsService) {}

  @Get('device/categories')
  @ApiOperation({ summary: 'Device categories supported by a node' })
  @ApiResponse({ status: 404, description: 'Node not connected' })
  async getDeviceCategories(@Query() query: NodeIdQueryDto): Promise<string[]> {
    return this.commands.getDeviceCategories(query.node_id);
  }

  @Get('device/types')
  @ApiOperation({ summary: 'Device types and their config schema, grouped by category' })
  async getDeviceTypes(@Query() query: NodeIdQueryDto) {
    return this.commands.getDeviceTypes(query.node_id);
  }

  @Get('teleop-groups/types')
  @ApiOperation({ summary: 'Teleop group types and the devices each one needs' })
  async getTeleopGroupTypes(@Query() query: NodeIdQueryDto) {
    return this.commands.getTeleopGroupTypes(query.node_id);
  }

  @Post('devices/test')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Ask a node to test a device connection' })
  @ApiResponse({ status: 400, description: 'Device test failed' })
  async testDevice(@Body() dto: DeviceTestDto) {
    return this.commands.testDevice(dto.node_id, {
      category: dto.category,
      type: dto.type,
      config: dto.config,
    });
  }
}
