export { Router, DuplicateRouteError } from './Router';
export type { Route, RouteMatch } from './Router';
