export { ArtifactWriter, isInsecureGateway, serializeJson } from './ArtifactWriter';
export type { ArtifactWriterOptions, HttpFetch } from './ArtifactWriter';
