import { Controller, Get } from '@nestjs/common';

@Controller()
export class AppController {
  @Get()
  getHello() {
    return {
      message: 'Welcome to the Prescription Safety API',
      version: '1.0.0',
      endpoints: ['/prescription-safety/analyze', '/prescription-safety/status'],
    };
  }
}
