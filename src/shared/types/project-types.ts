/**
 * Project definition types.
 * A project is loaded once from project.json and never mutated afterwards;
 * only the VariableStore created from it changes during a session.
 */

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'] as const;
export type HttpMethod = typeof HTTP_METHODS[number];

/** The `method` value that marks a Socket.IO monitor entry */
export const SOCKET_IO_METHOD = 'Socket.IO';

/**
 * A value tree whose strings may contain `{{identifier}}` placeholders.
 * Keys are never templated.
 */
export type TemplateValue =
  | string
  | number
  | boolean
  | null
  | TemplateValue[]
  | { [key: string]: TemplateValue };

/** Flat mapping of string templates (query parameters, headers) */
export type TemplateRecord = Record<string, string>;

/** An HTTP request entry of a project */
export interface HttpRequestDefinition {
  readonly kind: 'http';
  readonly desc: string;
  readonly method: HttpMethod;
  /** Path appended to the project's api base, e.g. `/products/{{next_id}}` */
  readonly endpoint: string;
  readonly headers?: Readonly<TemplateRecord>;
  readonly params?: Readonly<TemplateRecord>;
  readonly body?: TemplateValue;
  /** Name of a registered response callback */
  readonly callback?: string;
}

/** Event emitted once per connection, e.g. a subscription request */
export interface EmitOnConnect {
  readonly event: string;
  readonly data: TemplateValue;
}

/** A Socket.IO monitor entry of a project */
export interface SocketRequestDefinition {
  readonly kind: 'socket';
  readonly desc: string;
  /** Server URL, e.g. `wss://stream.example.com` */
  readonly endpoint: string;
  readonly namespace?: string;
  /** Sent as the connection query */
  readonly params?: Readonly<TemplateRecord>;
  readonly emitOnConnect?: EmitOnConnect;
}

export type RequestDefinition = HttpRequestDefinition | SocketRequestDefinition;

/** Validated contents of a project.json file (base project already merged) */
export interface ProjectDefinition {
  readonly name: string;
  /** Output directory relative to the project directory; may contain placeholders */
  readonly outputPath: string;
  /** Base URL for every HTTP request; may contain placeholders */
  readonly apiBase: string;
  readonly variables: Readonly<Record<string, string>>;
  readonly requests: readonly RequestDefinition[];
  /** Name of a registered menu hint */
  readonly menuCallback?: string;
}

/**
 * The output of template resolution for one HTTP request.
 * Created fresh per execution.
 */
export interface ResolvedRequest {
  readonly desc: string;
  readonly method: HttpMethod;
  readonly apiBase: string;
  readonly endpoint: string;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly params: Readonly<Record<string, string>>;
  readonly body?: TemplateValue;
}
