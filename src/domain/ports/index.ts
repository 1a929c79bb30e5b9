export type { IModeHandler, ExecutionContext, TestPaths } from './mode-handler.js';
export type { IPropsLoader, IRevisionLister } from './props-loader.js';
export type { ICompilerInvoker, InvokeOptions, ProcessResult } from './compiler-invoker.js';
