// Runtime
export { App, renderPage } from './runtime/app.js';
export type { AppOptions, ErrorHandler, LayoutFunc, LayoutProps, PageOptions } from './runtime/app.js';
export { RequestContext } from './runtime/context.js';
export type { Context, HandlerFunc, HandlerResult, MiddlewareFunc, RecordedResponse, ContextInit } from './runtime/context.js';
export {
  executeProxy,
  proxyContinue,
  proxyJson,
  proxyRedirect,
  proxyResponse,
  proxyRewrite,
  withHeaders,
} from './runtime/proxy.js';
export type { ProxyFunc, ProxyResult } from './runtime/proxy.js';
export { createRequestListener } from './runtime/node.js';

// Routing core
export { RouteTree, scopeContains, scopeFromPattern } from './routing/route-tree.js';
export type { MiddlewareEntry, ProxyEntry, RouteEntry, RouteMatch } from './routing/route-tree.js';
export { compileMatcher, compilePathPattern, PatternCompileError } from './routing/proxy-pattern.js';
export type { CompiledMatcher } from './routing/proxy-pattern.js';
export { calculatePriority, deriveTitle, translatePath, translateSegment } from './routing/segments.js';
export type { Segment, TranslatedPath } from './routing/segments.js';
export { scanApp, ScanError } from './routing/scanner.js';
export { resolveConflicts } from './routing/conflicts.js';
export type { ParamWarning, ResolvedRoutes, RouteConflict } from './routing/conflicts.js';
export { HTTP_METHODS } from './routing/types.js';
export type {
  HttpMethod,
  LayoutRecord,
  MiddlewareRecord,
  PageParam,
  PageRecord,
  ProxyDescriptor,
  RouteRecord,
  ScanResult,
} from './routing/types.js';

// Build
export { generateRoutesFile, renderRoutesModule, summarizeGeneration, OutputConflictError } from './cli/routes-generator.js';
export type { GenerateOptions, GenerateResult, GenerationSummary } from './cli/routes-generator.js';
export { generateOpenApiDocument, serializeOpenApi, writeOpenApiFile } from './cli/openapi.js';
export type { OpenApiDocument, OpenApiFormat, OpenApiOptions, OpenApiVersion } from './cli/openapi.js';
