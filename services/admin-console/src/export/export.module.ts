import { Module } from '@nestjs/common';
import { CSV_EXPORTER } from './csv-exporter.interface';
import { CsvExporterService } from './csv-exporter.service';

@Module({
  providers: [{ provide: CSV_EXPORTER, useClass: CsvExporterService }],
  exports: [CSV_EXPORTER],
})
export class ExportModule {}
