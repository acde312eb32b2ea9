import { Module } from '@nestjs/common';
import { CatalogModule } from '../catalog/catalog.module';
import { ChatLogModule } from '../chat-log/chat-log.module';
import { GeneratorModule } from '../generator/generator.module';
import { InsightsService } from './insights.service';
import { InsightsController } from './insights.controller';

@Module({
  imports: [CatalogModule, ChatLogModule, GeneratorModule],
  controllers: [InsightsController],
  providers: [InsightsService],
})
export class InsightsModule {}
