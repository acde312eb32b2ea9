import { Body, Controller, Get, HttpCode, Param, ParseIntPipe, Patch, Post, Query } from '@nestjs/common';
import { Throttle } from '@nestjs/throttler';
import { presentProduct } from '../catalog/product.presenter';
import { MODEL_ROUTE_THROTTLE } from '../common/throttle.config';
import { ChatLogService } from '../chat-log/chat-log.service';
import { CreateProductDto } from './dto/create-product.dto';
import { ExplainProductDto } from './dto/explain-product.dto';
import { UpdateDescriptionDto } from './dto/update-description.dto';
import { InsightsService } from './insights.service';

@Controller('insights')
export class InsightsController {
  constructor(
    private readonly insights: InsightsService,
    private readonly chatLog: ChatLogService,
  ) {}

  @Post('explain')
  @HttpCode(200)
  @Throttle(MODEL_ROUTE_THROTTLE)
  explain(@Body() dto: ExplainProductDto) {
    return this.insights.explain(dto.productName, dto.question);
  }

  @Post('products')
  @Throttle(MODEL_ROUTE_THROTTLE)
  async create(@Body() dto: CreateProductDto) {
    return presentProduct(await this.insights.insertProduct(dto.name));
  }

  @Patch('products/:id')
  @Throttle(MODEL_ROUTE_THROTTLE)
  async revise(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateDescriptionDto) {
    return presentProduct(await this.insights.reviseDescription(id, dto.description));
  }

  @Get('log')
  log(@Query('limit') limitRaw?: string) {
    const limit = limitRaw ? Number.parseInt(limitRaw, 10) : undefined;
    return this.chatLog.recent(limit);
  }
}
