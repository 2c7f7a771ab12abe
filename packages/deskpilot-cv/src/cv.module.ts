import { DynamicModule, Module, ModuleMetadata } from '@nestjs/common';
import { OmniParserClientService } from './services/omniparser-client.service';
import { PerceptionService } from './services/perception.service';

export interface CvModuleOptions {
  /** Modules that provide the SCREEN_CAPTURE token */
  imports?: ModuleMetadata['imports'];
}

@Module({})
export class CvModule {
  static register(options: CvModuleOptions = {}): DynamicModule {
    return {
      module: CvModule,
      imports: options.imports ?? [],
      providers: [OmniParserClientService, PerceptionService],
      exports: [OmniParserClientService, PerceptionService],
    };
  }
}
