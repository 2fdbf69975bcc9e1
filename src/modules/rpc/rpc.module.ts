import { Module } from '@nestjs/common';
import { ConfigModule } from '../../infra/config/config.module';
import { StorageModule } from '../../infra/storage/storage.module';
import { InboundRequestDispatcher } from './inbound-dispatcher.service';
import { NodeRpcGateway } from './node-rpc.gateway';
import { NodeRpcHub } from './node-rpc-hub.service';
import { NodeRpcService } from './node-rpc.service';

@Module({
  imports: [ConfigModule, StorageModule],
  providers: [NodeRpcHub, InboundRequestDispatcher, NodeRpcService, NodeRpcGateway],
  exports: [NodeRpcService],
})
export class RpcModule {}
