import {
  Body,
  Controller,
  DefaultValuePipe,
  Get,
  HttpCode,
  Param,
  ParseIntPipe,
  Post,
  Query,
} from '@nestjs/common';
import { CampaignsService, DEFAULT_RESULTS_LIMIT } from './campaigns.service';
import { CreateCampaignDto } from './dto/create-campaign.dto';
import {
  CampaignResultsPage,
  CampaignStatusView,
} from './interfaces/campaign-view.interface';

@Controller('campaigns')
export class CampaignsController {
  constructor(private readonly campaignsService: CampaignsService) {}

  @Post()
  async create(@Body() dto: CreateCampaignDto): Promise<CampaignStatusView> {
    const id = await this.campaignsService.create(dto);
    return this.campaignsService.getStatus(id);
  }

  @Get(':id')
  getStatus(@Param('id') id: string): Promise<CampaignStatusView> {
    return this.campaignsService.getStatus(id);
  }

  @Get(':id/results')
  listResults(
    @Param('id') id: string,
    @Query('limit', new DefaultValuePipe(DEFAULT_RESULTS_LIMIT), ParseIntPipe)
    limit: number,
    @Query('offset', new DefaultValuePipe(0), ParseIntPipe) offset: number,
  ): Promise<CampaignResultsPage> {
    return this.campaignsService.listResults(id, limit, offset);
  }

  @Post(':id/start')
  @HttpCode(200)
  start(@Param('id') id: string): Promise<CampaignStatusView> {
    return this.campaignsService.start(id);
  }

  @Post(':id/pause')
  @HttpCode(200)
  pause(@Param('id') id: string): Promise<CampaignStatusView> {
    return this.campaignsService.pause(id);
  }

  @Post(':id/resume')
  @HttpCode(200)
  resume(@Param('id') id: string): Promise<CampaignStatusView> {
    return this.campaignsService.resume(id);
  }

  @Post(':id/cancel')
  @HttpCode(200)
  cancel(@Param('id') id: string): Promise<CampaignStatusView> {
    return this.campaignsService.cancel(id);
  }
}
