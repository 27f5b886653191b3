// /v1/quote, /v1/quotes 엔드포인트. 쿼리를 받아서 서비스 호출
import { BadRequestException, Controller, Get, Header, Query } from '@nestjs/common';
import type { QuoteRecordResponse, QuoteResponse } from '@ratedesk/shared';
import { RequestSignal } from '../common/request-signal.decorator';
import { HistoryQueryDto } from './dto/history-query.dto';
import { toQuoteResponse, toRecordResponse } from './quote.mapper';
import { QuotesService } from './quotes.service';

@Controller()
export class QuotesController {
  constructor(private readonly quotes: QuotesService) {}

  // 요청마다 거래소에서 새로 가져와 저장함
  @Get('quote')
  @Header('Cache-Control', 'no-store')
  async current(@RequestSignal() signal: AbortSignal): Promise<QuoteResponse> {
    return toQuoteResponse(await this.quotes.getQuote(signal));
  }

  @Get('quotes/latest')
  async latest(): Promise<QuoteRecordResponse> {
    return toRecordResponse(await this.quotes.latest());
  }

  @Get('quotes')
  async history(@Query() q: HistoryQueryDto): Promise<QuoteRecordResponse[]> {
    const from = new Date(q.from);
    const to = new Date(q.to);
    if (from.getTime() > to.getTime()) {
      throw new BadRequestException({ error: 'QUOTES_RANGE_INVALID', from: q.from, to: q.to });
    }
    const records = await this.quotes.history(from, to);
    return records.map(toRecordResponse);
  }
}
