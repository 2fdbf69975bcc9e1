import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { ConfigModule } from './infra/config/config.module';
import { StorageModule } from './infra/storage/storage.module';
import { RpcModule } from './modules/rpc/rpc.module';
import { NodesModule } from './modules/nodes/nodes.module';

/** Root application module. ConfigModule loads .env first; containers inject env directly. */
@Module({
  imports: [ConfigModule, StorageModule, RpcModule, NodesModule],
  controllers: [AppController],
  providers: [],
})
export class AppModule {}
