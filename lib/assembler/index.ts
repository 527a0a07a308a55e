export { ContextAssembler } from "./assembler"
export type { AssemblerDeps } from "./assembler"
export { contextStats, formatContextStats } from "./stats"
export type { ContextStats, SectionStats } from "./stats"
export { ASSEMBLY_STAGES } from "./types"
export type {
    AssembleRequest,
    AssembledContext,
    AssemblyStage,
    ContentSection,
    RenderedSection,
} from "./types"
