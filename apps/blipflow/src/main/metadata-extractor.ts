import fs from "node:fs/promises";
import { z } from "zod";
import type {
  AcquisitionParams,
  PhaseEncodeDirection,
  PhaseEncodeIndex,
} from "../shared/contracts.js";
import type { Logger } from "./logger.js";
import { getSidecarPath } from "./run-paths.js";

export const DEFAULT_READOUT_TIME = 0.05;

const PHASE_ENCODE_INDEX: Record<PhaseEncodeDirection, PhaseEncodeIndex> = {
  "j-": 1,
  j: 2,
};

// Fields that are present but malformed are dropped instead of failing the parse.
const sidecarSchema = z
  .object({
    TotalReadoutTime: z.number().positive().finite().optional().catch(undefined),
    PhaseEncodingDirection: z.string().optional().catch(undefined),
  })
  .passthrough();

export type SidecarMetadata = {
  totalReadoutTime?: number;
  phaseEncodingDirection?: string;
};

export const parseSidecar = (raw: string): SidecarMetadata | null => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = sidecarSchema.safeParse(parsed);
  if (!result.success) return null;
  return {
    totalReadoutTime: result.data.TotalReadoutTime,
    phaseEncodingDirection: result.data.PhaseEncodingDirection,
  };
};

/** Reads the JSON sidecar that sits beside an image; absent or unreadable yields `null`. */
export const readSidecar = async (
  imagePath: string,
  logger?: Logger
): Promise<SidecarMetadata | null> => {
  const sidecarPath = getSidecarPath(imagePath);
  let raw: string;
  try {
    raw = await fs.readFile(sidecarPath, "utf-8");
  } catch (error) {
    const code = (error as NodeJS.ErrnoException | undefined)?.code;
    if (code !== "ENOENT") {
      logger?.warn("sidecar unreadable", { sidecarPath, code });
    }
    return null;
  }
  const metadata = parseSidecar(raw);
  if (!metadata) {
    logger?.warn("sidecar is not a JSON object", { sidecarPath });
  }
  return metadata;
};

export const phaseEncodeIndexFor = (direction: string | undefined): PhaseEncodeIndex | null =>
  direction === "j" || direction === "j-" ? PHASE_ENCODE_INDEX[direction] : null;

export const extractAcquisitionParams = async (params: {
  primarySeriesPath: string;
  auxImageAPath: string;
  phaseEncodeOverride?: PhaseEncodeDirection;
  logger?: Logger;
}): Promise<AcquisitionParams> => {
  const { logger } = params;
  const auxSidecar = await readSidecar(params.auxImageAPath, logger);

  let readoutTime = DEFAULT_READOUT_TIME;
  let readoutTimeSource: AcquisitionParams["readoutTimeSource"] = "default";
  if (auxSidecar?.totalReadoutTime !== undefined) {
    readoutTime = auxSidecar.totalReadoutTime;
    readoutTimeSource = "sidecar";
  } else {
    logger?.warn("TotalReadoutTime not in sidecar; defaulting", {
      readoutTime: DEFAULT_READOUT_TIME,
      sidecarPath: getSidecarPath(params.auxImageAPath),
    });
  }

  let phaseEncodeIndex: PhaseEncodeIndex = 1;
  let phaseEncodeSource: AcquisitionParams["phaseEncodeSource"] = "default";
  if (params.phaseEncodeOverride) {
    phaseEncodeIndex = PHASE_ENCODE_INDEX[params.phaseEncodeOverride];
    phaseEncodeSource = "override";
  } else {
    const primarySidecar = await readSidecar(params.primarySeriesPath, logger);
    if (primarySidecar) {
      phaseEncodeIndex = phaseEncodeIndexFor(primarySidecar.phaseEncodingDirection) ?? 1;
      phaseEncodeSource = "sidecar";
    }
  }

  logger?.info("acquisition parameters", {
    readoutTime,
    readoutTimeSource,
    phaseEncodeIndex,
    phaseEncodeSource,
  });
  return { readoutTime, readoutTimeSource, phaseEncodeIndex, phaseEncodeSource };
};
