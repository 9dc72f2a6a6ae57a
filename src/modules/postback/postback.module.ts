import { Module } from '@nestjs/common';
import axios from 'axios';
import { POSTBACK_HTTP, PostbackService } from './postback.service';

@Module({
  providers: [
    { provide: POSTBACK_HTTP, useFactory: () => axios.create() },
    PostbackService,
  ],
  exports: [PostbackService],
})
export class PostbackModule {}
