export { ArtifactCollector, collectArtifacts, compareArtifacts } from './artifact-collector';
