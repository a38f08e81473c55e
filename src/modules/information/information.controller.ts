// modules/information/information.controller.ts
import { Body, Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { AnswerService, InformationHierarchyService } from './services';
import { InformationQueryDto } from './dto/information-query.dto';
import { serializeResult } from './information-result.util';

@ApiTags('information')
@Controller({ path: 'information', version: '1' })
export class InformationController {
  constructor(
    private readonly hierarchyService: InformationHierarchyService,
    private readonly answerService: AnswerService,
  ) {}

  /**
   * POST /information/query - Farmer, country and global information for a question
   */
  @Post('query')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Query the information hierarchy' })
  @ApiBody({ type: InformationQueryDto })
  @ApiResponse({ status: 200, description: 'Items per relevance tier with query metadata' })
  async query(@Body() dto: InformationQueryDto) {
    const result = await this.hierarchyService.queryInformation(dto);
    return serializeResult(result);
  }

  /**
   * POST /information/answer - Generated answer grounded in the hierarchy
   */
  @Post('answer')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Answer a question using the information hierarchy' })
  @ApiBody({ type: InformationQueryDto })
  @ApiResponse({ status: 503, description: 'Language model temporarily unavailable' })
  async answer(@Body() dto: InformationQueryDto) {
    return this.answerService.answer(dto);
  }

  /**
   * GET /information/sources - What each registered source may provide
   */
  @Get('sources')
  @ApiOperation({ summary: 'Capabilities of registered information sources' })
  getSources() {
    return this.hierarchyService.getSourceCapabilities();
  }
}
