import { Controller, Get, NotFoundException, Param, ParseIntPipe } from '@nestjs/common';
import { CatalogService } from './catalog.service';
import { presentProduct } from './product.presenter';

@Controller('products')
export class CatalogController {
  constructor(private readonly catalog: CatalogService) {}

  @Get()
  list() {
    return this.catalog.listProducts();
  }

  @Get('names')
  names() {
    return this.catalog.listProductNames();
  }

  @Get('by-name/:name')
  async byName(@Param('name') name: string) {
    const description = await this.catalog.findDescription(name);
    if (description === null) {
      throw new NotFoundException(`Product "${name}" not found`);
    }
    return { name, description };
  }

  @Get(':id')
  async byId(@Param('id', ParseIntPipe) id: number) {
    const product = await this.catalog.findById(id);
    if (!product) {
      throw new NotFoundException(`Product ${id} not found`);
    }
    return presentProduct(product);
  }
}
