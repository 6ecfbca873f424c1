import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { BuildingsController } from './buildings.controller';
import { BuildingsRepository } from './buildings.repository';
import { BuildingsService } from './buildings.service';

@Module({
  imports: [AuthModule],
  controllers: [BuildingsController],
  providers: [BuildingsRepository, BuildingsService],
  exports: [BuildingsRepository, BuildingsService],
})
export class BuildingsModule {}
