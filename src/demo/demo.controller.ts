import { Controller, Get, Req } from '@nestjs/common';

import { requireIdentity, RequestWithIdentity } from '../access/request-identity';

// Sample routes, one per policy kind.
@Controller()
export class DemoController {
  @Get('guest-demo')
  guest(): { message: string } {
    return { message: 'Hello, guest' };
  }

  @Get('admin-demo')
  admin(@Req() request: RequestWithIdentity): { message: string; email: string } {
    const identity = requireIdentity(request);
    return { message: 'Hello, admin', email: identity.email };
  }

  @Get('protected')
  protectedRoute(): { message: string } {
    return { message: 'Password accepted' };
  }
}
