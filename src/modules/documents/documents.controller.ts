import { Body, Controller, HttpCode, Post } from '@nestjs/common';
import { CurrentUser } from '../../common/decorators/current-user.decorator';
import { CurrentUser as ICurrentUser } from '../../common/interfaces/response.interface';
import { DocumentsService } from './documents.service';
import { ProcessDocumentDto, ProcessDocumentResponseDto } from './dto/process-document.dto';

@Controller('documents')
export class DocumentsController {
  constructor(private readonly documentsService: DocumentsService) {}

  /**
   * POST /api/documents/process
   * 扣减一篇文档额度
   */
  @Post('process')
  @HttpCode(200)
  async process(
    @Body() dto: ProcessDocumentDto,
    @CurrentUser() user: ICurrentUser,
  ): Promise<ProcessDocumentResponseDto> {
    return this.documentsService.process(user.id, dto);
  }
}
