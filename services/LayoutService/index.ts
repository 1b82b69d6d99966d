export { LayoutService } from './LayoutService';
export type { ILayoutService, ILayoutSink, LayoutOptions, EngineCommand } from './ILayoutService';
