export {
  makeReferenceDataHealthChecker,
  type ReferenceDataHealthCheckerOptions,
} from './reference-data-checker.js';
