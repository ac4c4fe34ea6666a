import type { ArtifactSet, ConversionRequest } from "../models.js";

export interface ArtifactConverter {
    convert(request: ConversionRequest): Promise<ArtifactSet>;
}
