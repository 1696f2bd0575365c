export type {
  PixelProjector,
  PixelSampler,
  PixelWindow,
  PointCloud,
  SampleWindowOptions,
} from "./window.js";
export {
  defaultWindow,
  NODATA,
  READ_BATCH_SIZE,
  sampleFiles,
  sampleWindow,
} from "./window.js";
