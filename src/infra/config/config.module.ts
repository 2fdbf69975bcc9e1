import { Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import { NODE_RPC_CONFIG, getNodeRpcConfig } from './env.config';

/**
 * Config module: loads .env and provides centralized env access.
 * NODE_RPC_CONFIG: call timeout and disconnect policy, overridable in tests.
 */
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
    }),
  ],
  providers: [{ provide: NODE_RPC_CONFIG, useFactory: getNodeRpcConfig }],
  exports: [NestConfigModule, NODE_RPC_CONFIG],
})
export class ConfigModule {}
