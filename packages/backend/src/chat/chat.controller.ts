import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Headers,
  Query,
  Res,
  UseGuards,
} from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { ThrottlerGuard } from '@nestjs/throttler';
import { DynamicAgentService } from '../intake/dynamic-agent.service';
import {
  ConversationTurn,
  SessionState,
  SessionSummary,
  TurnResult,
} from '../intake/intake.types';
import { CORRELATION_ID_HEADER } from '../logging/correlation.middleware';
import { StructuredLoggerService } from '../logging/structured-logger.service';
import { ListSessionsQueryDto, SendMessageDto, StartChatDto } from './dto/chat.dto';

export interface MessageResponse extends TurnResult {
  processingTimeMs: number;
}

/**
 * What turn cancellation needs from the HTTP response
 */
export interface ClosableResponse {
  readonly writableFinished: boolean;
  on(event: 'close', listener: () => void): unknown;
  off(event: 'close', listener: () => void): unknown;
}

export interface HistoryResponse {
  sessionId: string;
  turns: ConversationTurn[];
}

/**
 * Chat API over the intake agent. A client that disconnects mid-turn
 * cancels the provider calls for that turn.
 */
@ApiTags('chat')
@Controller('api/chat')
@UseGuards(ThrottlerGuard)
export class ChatController {
  constructor(
    private readonly agent: DynamicAgentService,
    private readonly logger: StructuredLoggerService,
  ) {
    this.logger.setContext(ChatController.name);
  }

  @Post('start')
  @ApiOperation({ summary: 'Start a conversation on a form' })
  async start(
    @Body() dto: StartChatDto,
    @Headers(CORRELATION_ID_HEADER) correlationId?: string,
  ): Promise<SessionState> {
    const state = await this.agent.startSession(dto.formId, {
      language: dto.language,
      sessionId: dto.sessionId,
    });
    this.logger.log('Chat session started', {
      correlationId,
      sessionId: state.sessionId,
      formId: state.formId,
    });
    return state;
  }

  @Post('message')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Send one user message and get the agent reply' })
  async sendMessage(
    @Body() dto: SendMessageDto,
    @Res({ passthrough: true }) res: ClosableResponse,
    @Headers(CORRELATION_ID_HEADER) correlationId?: string,
  ): Promise<MessageResponse> {
    const log = this.logger.child({ correlationId, sessionId: dto.sessionId });
    const done = log.startTimer('turn', { isVoice: dto.isVoice });

    const controller = new AbortController();
    const onClose = (): void => {
      if (!res.writableFinished) {
        log.warn('Client disconnected, cancelling turn');
        controller.abort();
      }
    };
    res.on('close', onClose);

    try {
      const result = await this.agent.startTurn(dto.sessionId, dto.message, {
        isVoice: dto.isVoice,
        signal: controller.signal,
      });
      const processingTimeMs = done({
        completion: result.completion,
        collected: Object.keys(result.partialRecord).length,
      });
      return { ...result, processingTimeMs };
    } finally {
      res.off('close', onClose);
    }
  }

  @Get('sessions/list')
  @ApiOperation({ summary: 'List recent sessions' })
  listSessions(@Query() query: ListSessionsQueryDto): Promise<SessionSummary[]> {
    return this.agent.listSessions({ formId: query.formId, limit: query.limit ?? 50 });
  }

  @Get(':sessionId/state')
  @ApiOperation({ summary: 'Current state of a session' })
  getState(@Param('sessionId') sessionId: string): Promise<SessionState> {
    return this.agent.getState(sessionId);
  }

  @Get(':sessionId/history')
  @ApiOperation({ summary: 'Conversation transcript' })
  async getHistory(@Param('sessionId') sessionId: string): Promise<HistoryResponse> {
    const state = await this.agent.getState(sessionId);
    return { sessionId, turns: state.turns };
  }

  @Delete(':sessionId')
  @ApiOperation({ summary: 'Discard a session' })
  async reset(@Param('sessionId') sessionId: string): Promise<{ message: string }> {
    await this.agent.resetSession(sessionId);
    return { message: `Session ${sessionId} reset` };
  }
}
