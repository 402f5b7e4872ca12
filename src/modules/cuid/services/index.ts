export { CuidGenerator, createGenerator, generate } from './cuid-generator.service';
export { GeneratorRegistry } from './generator-registry.service';
export {
  deriveFingerprint,
  defaultFingerprintSources,
  hostComponent,
  processComponent,
} from './fingerprint.service';
