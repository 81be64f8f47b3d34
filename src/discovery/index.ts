export type {
  CourseCandidate,
  NormalizedCourseUrl,
  PacingOptions,
  SourceAdapter,
  SourceFetchFailure,
  SourceFetchResult,
  SourceId,
  SourceKind,
} from './types.js';
export { normalizeCourseUrl } from './url-normalizer.js';
export { GotHttpClient, buildRequestUrl, parseJsonBody } from './http-client.js';
export type { HttpClient, GotHttpClientOptions, RequestOptions } from './http-client.js';
export {
  SOURCE_KINDS,
  SOURCE_ORDER,
  createSourceAdapters,
  RealDiscountSource,
  DiscudemySource,
  CourseVaniaSource,
  UdemyFreebiesSource,
} from './sources/index.js';
export type { SourceRegistryOptions } from './sources/index.js';
