import { Module } from '@nestjs/common';
import { StorageModule } from '../../infra/storage/storage.module';
import { RpcModule } from '../rpc/rpc.module';
import { DeviceCatalogController } from './device-catalog.controller';
import { NodeCommandsService } from './node-commands.service';
import { NodesController } from './nodes.controller';

@Module({
  imports: [RpcModule, StorageModule],
  controllers: [NodesController, DeviceCatalogController],
  providers: [NodeCommandsService],
})
export class NodesModule {}
