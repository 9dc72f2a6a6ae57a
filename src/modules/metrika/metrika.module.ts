import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { AxiosMeasurementTransport } from './axios-measurement.transport';
import { buildMetrikaConfig } from './metrika.config';
import { MetrikaDispatcherService } from './metrika-dispatcher.service';
import {
  EVENT_DISPATCHER,
  MEASUREMENT_TRANSPORT,
  METRIKA_CONFIG,
  METRIKA_HTTP,
} from './metrika.types';

@Global()
@Module({
  providers: [
    {
      provide: METRIKA_CONFIG,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        buildMetrikaConfig(configService),
    },
    {
      provide: METRIKA_HTTP,
      useFactory: () => axios.create(),
    },
    { provide: MEASUREMENT_TRANSPORT, useClass: AxiosMeasurementTransport },
    MetrikaDispatcherService,
    { provide: EVENT_DISPATCHER, useExisting: MetrikaDispatcherService },
  ],
  exports: [METRIKA_CONFIG, MetrikaDispatcherService, EVENT_DISPATCHER],
})
export class MetrikaModule {}
