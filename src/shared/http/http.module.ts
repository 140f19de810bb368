import { Module } from '@nestjs/common';
import { Agent } from 'undici';
import { LoggingModule } from '../logging/logging.module';
import { HTTP_DISPATCHER, HttpClientService } from './http-client.service';

@Module({
  imports: [LoggingModule],
  providers: [
    {
      provide: HTTP_DISPATCHER,
      useFactory: () =>
        new Agent({
          connections: 10,
          pipelining: 1,
          keepAliveTimeout: 30000,
          keepAliveMaxTimeout: 60000,
        }),
    },
    HttpClientService,
  ],
  exports: [HttpClientService],
})
export class HttpModule {}
