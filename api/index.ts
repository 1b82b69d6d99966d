/**
 * Public surface of quire: the syntax tree, the model capability and its
 * erasure adapter, feedback types and the layout service.
 */

export * from '@core/types';
export { Model, SyntaxModel, modelsEqual, cloneModel, downcastModel } from '@core/model';
export type { IModel, ModelClass } from '@core/model';
export * from '@core/errors';
export { ConfigLoader } from '@core/config/loader';
export type { ConfigLoaderOptions } from '@core/config/loader';
export type { QuireConfig, ResolvedConfig, LayoutConfig, LoggingConfig } from '@core/config/types';
export { formatDiagnostic, formatFeedback } from '@core/utils/diagnosticFormatter';
export type { DiagnosticDisplayOptions } from '@core/utils/diagnosticFormatter';
export { formatSpan, formatPosition } from '@core/utils/locationFormatter';
export { LayoutService } from '@services/LayoutService';
export type { ILayoutService, ILayoutSink, LayoutOptions, EngineCommand } from '@services/LayoutService';
