// src/module/thresholds/thresholds.controller.ts
import { Body, Controller, Get, Put } from '@nestjs/common';
import { ThresholdsService } from './thresholds.service';
import { UpdateThresholdsDto } from './dto/thresholds.dto';

@Controller('thresholds')
export class ThresholdsController {
  constructor(private readonly thresholds: ThresholdsService) {}

  @Get()
  current() {
    return { data: this.thresholds.get() };
  }

  @Put()
  update(@Body() body: UpdateThresholdsDto) {
    const { thresholds, warnings } = this.thresholds.update({
      tempMin     : body.tempMin,
      tempMax     : body.tempMax,
      humidityMin : body.humidityMin,
      humidityMax : body.humidityMax,
    });
    return {
      data: { thresholds, warnings },
      message: warnings.length
        ? `Thresholds updated with ${warnings.length} warning(s)`
        : 'Thresholds updated',
    };
  }
}
