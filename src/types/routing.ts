/**
 * HTTP methods a route may be declared under
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH' | 'HEAD' | 'OPTIONS';

export const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'HEAD', 'OPTIONS'];

/**
 * Structured value exchanged with handlers: anything JSON can carry
 */
export type GenericValue =
  | null
  | boolean
  | number
  | string
  | GenericValue[]
  | { [key: string]: GenericValue };

/**
 * Flat name → string mapping used for path and query parameters
 */
export type ParamMap = Readonly<Record<string, string>>;

export type HandlerResult = GenericValue | undefined;

/**
 * Handler interface shared by every declared route
 */
export type RouteHandler = (
  path: ParamMap,
  query: ParamMap,
  body: GenericValue,
) => HandlerResult | Promise<HandlerResult>;

export interface RouteDescriptor {
  readonly method: HttpMethod;
  readonly template: string;
  readonly handler: RouteHandler;
}

export type Segment =
  | { readonly kind: 'static'; readonly text: string }
  | { readonly kind: 'param'; readonly name: string };

export interface CompiledTemplate {
  readonly template: string;
  readonly segments: readonly Segment[];
}

export interface RouteEntry {
  readonly method: HttpMethod;
  readonly template: string;
  readonly compiled: CompiledTemplate;
  readonly handler: RouteHandler;
  /** Number of static segments; higher wins when templates overlap */
  readonly specificity: number;
  /** Position in the descriptor sequence */
  readonly order: number;
}

export interface RouteRegistry {
  readonly methods: readonly HttpMethod[];
  entriesFor(method: string): readonly RouteEntry[];
  entries(): readonly RouteEntry[];
}

/**
 * Raw request as handed over by the transport
 */
export interface DispatchRequest {
  method: string;
  path: string;
  query?: string;
  body?: Buffer | string;
}

export interface DispatchResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}
