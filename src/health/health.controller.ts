import { Controller, Get } from '@nestjs/common';

import { StoreService } from '../store/store.service';
import { StoreHealth } from '../store/types';

@Controller('health')
export class HealthController {
  constructor(private readonly storeService: StoreService) {}

  @Get()
  getHealth(): { status: string } {
    return { status: 'ok' };
  }

  @Get('store')
  async getStoreHealth(): Promise<StoreHealth> {
    return this.storeService.checkHealth();
  }
}
