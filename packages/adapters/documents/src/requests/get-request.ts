import { ValidationError, type ActionRequest } from '@restlift/core';
import {
  ReadVersionSchema,
  RequiredNameSchema,
  safeValidateGetRequestOptions,
  type FetchSource,
  type GetRequestOptions,
  type VersionType,
} from '../validation.js';

/**
 * GetRequest
 * Reads one document by index, type and id. Also used for existence checks.
 */
export class GetRequest implements ActionRequest {
  readonly index?: string;
  readonly type: string;
  readonly id?: string;
  readonly routing?: string;
  readonly parent?: string;
  readonly preference?: string;
  readonly realtime: boolean;
  readonly refresh: boolean;
  readonly storedFields?: readonly string[];
  readonly version?: number;
  readonly versionType: VersionType;
  readonly fetchSource?: FetchSource;

  constructor(options: GetRequestOptions = {}) {
    this.index = options.index;
    this.type = options.type ?? '_all';
    this.id = options.id;
    this.routing = options.routing;
    this.parent = options.parent;
    this.preference = options.preference;
    this.realtime = options.realtime ?? true;
    this.refresh = options.refresh ?? false;
    this.storedFields = options.storedFields;
    this.version = options.version;
    this.versionType = options.versionType ?? 'internal';
    this.fetchSource = options.fetchSource;
  }

  /**
   * Build a request from untrusted input, e.g. parsed JSON
   */
  static from(input: unknown): GetRequest {
    const validated = safeValidateGetRequestOptions(input);
    if (!validated.success) {
      throw new ValidationError(
        validated.error.issues.map((issue) => `${issue.path.map(String).join('.') || 'request'}: ${issue.message}`),
        { issues: validated.error.issues }
      );
    }
    return new GetRequest(validated.data);
  }

  validate(): ValidationError | undefined {
    let error: ValidationError | undefined;
    if (!RequiredNameSchema.safeParse(this.index).success) {
      error = ValidationError.add('index is missing', error);
    }
    if (!RequiredNameSchema.safeParse(this.type).success) {
      error = ValidationError.add('type is missing', error);
    }
    if (!RequiredNameSchema.safeParse(this.id).success) {
      error = ValidationError.add('id is missing', error);
    }
    if (this.version !== undefined && !ReadVersionSchema.safeParse(this.version).success) {
      error = ValidationError.add(
        `illegal version value [${this.version}] for version type [${this.versionType.toUpperCase()}]`,
        error
      );
    }
    if (this.versionType === 'force') {
      error = ValidationError.add('version type [force] may no longer be used', error);
    }
    return error;
  }
}

/**
 * Request for the cluster's main endpoint. Carries nothing and never fails validation.
 */
export class MainRequest implements ActionRequest {
  validate(): undefined {
    return undefined;
  }
}
