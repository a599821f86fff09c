// 1. Asset records held by the registry
export type PreviewState = "absent" | "pending" | "ready";

export interface TrimOutput {
  path: string;
  name: string;
}

export interface Asset {
  id: string;
  originalFilename: string;
  sourcePath: string;
  // 0 until the first duration probe succeeds
  durationSeconds: number;
  browserPlayable: boolean;
  codec: string | null;
  previewState: PreviewState;
  trimOutput?: TrimOutput;
}

export type AssetPatch = Partial<
  Pick<
    Asset,
    "durationSeconds" | "browserPlayable" | "codec" | "previewState" | "trimOutput"
  >
>;

// 2. Data handed to the preview worker
export interface PreviewJobData {
  assetId: string;
}

// 3. API inputs and outputs
export interface TrimRequestBody {
  id: string;
  start?: string | number;
  end?: string | number | null;
  output_name?: string;
}

export interface UploadResponse {
  id: string;
  filename: string;
  duration: number;
  duration_str: string;
  browser_playable: boolean;
  preview_state: PreviewState;
}

export interface PreviewStatus {
  videoId: string;
  exists: boolean;
  browserPlayable: boolean;
  usePreview: boolean;
  state: PreviewState;
}
