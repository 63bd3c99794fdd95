import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../../config/configuration';
import { APP_LOGGER, createAppLogger } from './logger';

@Global()
@Module({
  providers: [
    {
      provide: APP_LOGGER,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const logging = configService.getOrThrow<AppConfig['logging']>('logging');
        return createAppLogger('scoring', logging);
      },
    },
  ],
  exports: [APP_LOGGER],
})
export class LoggerModule {}
