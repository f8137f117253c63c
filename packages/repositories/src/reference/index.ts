export {
  loadWorld,
  loadCatalog,
  ReferenceDataLoadError,
  type LoadReferenceOptions,
} from './loader.js';
