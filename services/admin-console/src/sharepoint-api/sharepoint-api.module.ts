import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { SharepointApiService } from './sharepoint-api.service';
import { sharepointDispatcherProvider } from './sharepoint-dispatcher.factory';
import { SharepointRestHttpService } from './sharepoint-rest-http.service';

@Module({
  imports: [ConfigModule],
  providers: [sharepointDispatcherProvider, SharepointRestHttpService, SharepointApiService],
  exports: [SharepointApiService],
})
export class SharepointApiModule {}
