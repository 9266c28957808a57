import { Body, Controller, Get, HttpCode, Post, Res } from '@nestjs/common';
import { Response } from 'express';
import { RiverRunnerRequestDto } from './dto/river-runner-request.dto';
import { PROCESS_METADATA } from './river-runner.constants';
import { RiverRunnerOutput, RiverRunnerService } from './river-runner.service';

@Controller('river-runner')
export class RiverRunnerController {
  constructor(private readonly riverRunnerService: RiverRunnerService) {}

  // Process description
  @Get()
  describeProcess(): typeof PROCESS_METADATA {
    return PROCESS_METADATA;
  }

  @Post('execution')
  @HttpCode(200)
  async execute(
    @Body() request: RiverRunnerRequestDto,
    @Res({ passthrough: true }) res: Pick<Response, 'type'>,
  ): Promise<RiverRunnerOutput> {
    const { mimeType, value } = await this.riverRunnerService.execute(request);
    res.type(mimeType);
    return value;
  }
}
