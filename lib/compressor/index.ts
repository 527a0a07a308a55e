export { Compressor } from "./compressor"
export type { CompressorDeps } from "./compressor"
export { truncateHead, truncateTail, truncateMiddle } from "./truncation"
export { defaultSignatureExtractor } from "./signature"
export { splitUnits, selectUnits, leadBiasScorer } from "./extractive"
export { COMPRESS_STRATEGIES, isCompressStrategy } from "./types"
export type {
    CompressStrategy,
    ReduceOptions,
    ReduceResult,
    SignatureExtractor,
    Summarizer,
    UnitScorer,
} from "./types"
