import { Module } from '@nestjs/common';
import { ThrottlerModule } from '@nestjs/throttler';
import { IntakeModule } from '../intake/intake.module';
import { ChatController } from './chat.controller';

@Module({
  imports: [
    IntakeModule,
    ThrottlerModule.forRoot([
      {
        ttl: 60000,
        limit: 60,
      },
    ]),
  ],
  controllers: [ChatController],
})
export class ChatModule {}
