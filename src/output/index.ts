export {
  ARTIFACT_NAMES,
  resolveOutputPaths,
  sanitizeFileComponent,
  chartFileName,
  chartFileNames,
  chartRelativePath,
  type OutputPaths,
} from "./paths.js";

export { writeChart, writeArtifacts, type ArtifactPaths, type ArtifactInput } from "./writer.js";
