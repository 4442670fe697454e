import {
  DynamicModule,
  InjectionToken,
  Module,
  ModuleMetadata,
  OptionalFactoryDependency,
} from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { PrescriptionSafetyController } from './prescription-safety.controller';
import { PrescriptionSafetyService } from './prescription-safety.service';
import { InferenceClientService } from './inference/inference-client.service';
import { ResponseInterpreter } from './analysis/response-interpreter';
import { RuleBasedAnalyzer } from './analysis/rule-based-analyzer';
import {
  PRESCRIPTION_SAFETY_OPTIONS,
  PrescriptionSafetyOptions,
  resolvePrescriptionSafetyOptions,
} from './config/prescription-safety.config';

export interface PrescriptionSafetyModuleAsyncOptions {
  imports?: ModuleMetadata['imports'];
  useFactory(
    ...args: unknown[]
  ):
    | Partial<PrescriptionSafetyOptions>
    | Promise<Partial<PrescriptionSafetyOptions>>;
  inject?: (InjectionToken | OptionalFactoryDependency)[];
}

const engineProviders = [
  InferenceClientService,
  ResponseInterpreter,
  RuleBasedAnalyzer,
  PrescriptionSafetyService,
];

@Module({})
export class PrescriptionSafetyModule {
  static forRoot(
    options: Partial<PrescriptionSafetyOptions> = {},
  ): DynamicModule {
    return {
      module: PrescriptionSafetyModule,
      imports: [HttpModule],
      providers: [
        {
          provide: PRESCRIPTION_SAFETY_OPTIONS,
          useValue: resolvePrescriptionSafetyOptions(options),
        },
        ...engineProviders,
      ],
      controllers: [PrescriptionSafetyController],
      exports: [PrescriptionSafetyService],
    };
  }

  static forRootAsync(
    options: PrescriptionSafetyModuleAsyncOptions,
  ): DynamicModule {
    return {
      module: PrescriptionSafetyModule,
      imports: [HttpModule, ...(options.imports ?? [])],
      providers: [
        {
          provide: PRESCRIPTION_SAFETY_OPTIONS,
          useFactory: async (...args: unknown[]) =>
            resolvePrescriptionSafetyOptions(await options.useFactory(...args)),
          inject: options.inject ?? [],
        },
        ...engineProviders,
      ],
      controllers: [PrescriptionSafetyController],
      exports: [PrescriptionSafetyService],
    };
  }
}
