import * as fs from 'fs';
import * as path from 'path';
import { ConfigurationError, PersistenceError, describeError } from '../errors';
import { isRecord } from '../utils/records';

export type HttpMethod = 'GET' | 'POST' | 'PUT';

/**
 * Management API call behind one (resource type, command) pair
 */
export interface Route {
  method: HttpMethod;
  /** Path template; `{name}` placeholders are filled from request parameters */
  path: string;
  query?: Record<string, string>;
  /** Field of the response body holding the list, when it is not the body itself */
  itemsField?: string;
}

export const DEFAULT_ROUTES_PATH = path.resolve(__dirname, '../../config/okta-routes.json');

const METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT'];
const CREATE_OPERATION = 'create';

/**
 * Maps resource types and commands to management API routes
 */
export class RouteTable {
  private routes: Map<string, Map<string, Route>>;

  constructor(routes: Map<string, Map<string, Route>>) {
    this.routes = routes;
  }

  static loadDefault(): RouteTable {
    return RouteTable.fromFile(DEFAULT_ROUTES_PATH);
  }

  static fromFile(filePath: string): RouteTable {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new PersistenceError(`Failed to load route table ${filePath}: ${describeError(error)}`, filePath, error);
    }
    return RouteTable.fromObject(parsed);
  }

  static fromObject(value: unknown): RouteTable {
    if (!isRecord(value)) {
      throw new ConfigurationError('Route table must be an object keyed by resource type');
    }

    const routes = new Map<string, Map<string, Route>>();
    for (const [resourceType, operations] of Object.entries(value)) {
      if (!isRecord(operations)) {
        throw new ConfigurationError(`Routes of ${resourceType} must be an object keyed by command`);
      }
      const byCommand = new Map<string, Route>();
      for (const [operation, route] of Object.entries(operations)) {
        byCommand.set(operation, RouteTable.parseRoute(`${resourceType}.${operation}`, route));
      }
      routes.set(resourceType, byCommand);
    }

    return new RouteTable(routes);
  }

  /**
   * Route of a list or get command
   */
  retrieval(resourceType: string, command: string): Route | undefined {
    return this.routes.get(resourceType)?.get(command);
  }

  /**
   * Creation route, preferring one registered for the capturing command
   * (`create:<command>`) over the type's generic `create`
   */
  creation(resourceType: string, command?: string): Route | undefined {
    const operations = this.routes.get(resourceType);
    if (!operations) return undefined;
    if (command !== undefined) {
      const specific = operations.get(`${CREATE_OPERATION}:${command}`);
      if (specific) return specific;
    }
    return operations.get(CREATE_OPERATION);
  }

  association(resourceType: string, command: string): Route | undefined {
    return this.routes.get(resourceType)?.get(command);
  }

  resourceTypes(): string[] {
    return [...this.routes.keys()];
  }

  private static parseRoute(key: string, value: unknown): Route {
    if (!isRecord(value)) {
      throw new ConfigurationError(`Route ${key} must be an object`);
    }

    const method = METHODS.find(candidate => candidate === value.method);
    if (!method) {
      throw new ConfigurationError(`Route ${key} has unsupported method ${String(value.method)}`);
    }

    if (typeof value.path !== 'string' || !value.path.startsWith('/')) {
      throw new ConfigurationError(`Route ${key} must have an absolute path`);
    }

    const route: Route = { method, path: value.path };

    if (value.query !== undefined) {
      if (!isRecord(value.query)) {
        throw new ConfigurationError(`Route ${key} query must be an object`);
      }
      const query: Record<string, string> = {};
      for (const [name, queryValue] of Object.entries(value.query)) {
        if (typeof queryValue !== 'string') {
          throw new ConfigurationError(`Route ${key} query parameter ${name} must be a string`);
        }
        query[name] = queryValue;
      }
      route.query = query;
    }

    if (value.itemsField !== undefined) {
      if (typeof value.itemsField !== 'string') {
        throw new ConfigurationError(`Route ${key} itemsField must be a string`);
      }
      route.itemsField = value.itemsField;
    }

    return route;
  }
}
