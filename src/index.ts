export * from './types';
export * from './errors';
export { OccupancyGrid } from './grid/OccupancyGrid';
export { loadMap, parseMap } from './grid/mapLoader';
export {
    candidateMoves,
    decideNextMove,
    primaryAxis,
    step,
    type Axis,
    type Decision,
    type FallbackOrder,
    type HeuristicOptions,
} from './planner/heuristic';
export { RouteDriver, type PlanResult, type RouteDriverOptions } from './planner/routeDriver';
export {
    MOVE_TOKENS,
    StepProtocolAdapter,
    toToken,
    type Ack,
    type MoveToken,
    type StepChannel,
    type StepProtocolOptions,
} from './protocol/stepProtocol';
export { WebSocketStepChannel, type WebSocketEndpoints } from './protocol/wsChannel';
export { resolveConfig, resolveGenerateConfig, type PlannerConfig, type GenerateConfig } from './config';
export { runPlanner, runGenerator, type PlannerDependencies } from './app';
export { renderMap } from './utils/mapRenderer';
export { generateCSV, generateJSON, generateRouteCSV } from './utils/exportUtils';
export { generatePGM, generateYAML, generateRosBundle } from './utils/rosExporter';
export { parseCSV } from './utils/csvParser';
export { createComponentLogger, initLogging, type LogLevel } from './logging';
