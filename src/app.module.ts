import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import irConfig from './config/ir.config';
import { IrModule } from './ir/ir.module';

/**
 * Root module: configuration first, then the IR services
 */
@Module({
  imports: [
    // Configuration - loaded first, available globally
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      load: [irConfig],
    }),

    IrModule,
  ],
})
export class AppModule {}
