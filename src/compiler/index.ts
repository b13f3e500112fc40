export * from './types';
export { tokenize, Lexer } from './lexer';
export type { LexerResult } from './lexer';
export { parseProtocol } from './parser';
export type { ParseResult } from './parser';
export { printDocument, printStatement, structuralForm } from './printer';
export type { StructuralStatement } from './printer';
export { analyze, topologicalOrder } from './analyzer';
export type { AnalyzerOptions, AnalysisResult } from './analyzer';
export { lowerProgram, LOWERING_TABLE } from './lowering';
export type { CommandDraft } from './lowering';
export { coalesce, eliminateNoOps, isNoOp } from './optimizer';
export { checkEnvelope } from './envelope';
export { generateCommands, buildStream } from './codegen';
export type { CodegenOptions, CodegenResult } from './codegen';
export { renderCommand, renderStream } from './gcode';
export { buildTrajectory } from './shaker_trajectory';
export type { Trajectory, TrajectoryPoint } from './shaker_trajectory';
export { compileProtocol } from './compile';
export type { CompileOptions, CompileResult, CompileAudit, CompileStage } from './compile';
export { CompileCache } from './compile_cache';
export type { CompileCacheStats } from './compile_cache';
