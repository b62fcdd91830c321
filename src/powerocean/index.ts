// Re-export public API
export { PowerOceanModule } from './powerocean.module';
export { PowerOceanNormalizer } from './powerocean-normalizer.service';
export { PowerOceanService } from './powerocean.service';
export type {
  PowerOceanDevice,
  SensorSnapshot,
} from './powerocean.service';
export type {
  PowerOceanEndpoint,
  SensorMap,
  SensorUnit,
  SensorValue,
} from './interfaces/endpoint.interface';
export { ReportExtractionError } from './interfaces/report.interface';
export type { IReportExtractor } from './interfaces/extractor.interface';
export { resolveTopology } from './topology.resolver';
export type { TopologyResolution } from './topology.resolver';
