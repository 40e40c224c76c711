/**
 * Insomnia 5.0 collection document, the shape written by the generator.
 * Property order in these objects is the order keys appear in the YAML.
 */

export const COLLECTION_TYPE = 'collection.insomnia.rest/5.0';

export interface ItemMeta {
  id: string;
  created: number;
  modified: number;
  isPrivate?: boolean;
  description?: string;
  sortKey?: number;
}

export interface KeyValueEntry {
  name: string;
  disabled: boolean;
  value: string;
}

export interface RequestBody {
  mimeType: string;
  text: string;
}

export interface RequestSettings {
  renderRequestBody: boolean;
  encodeUrl: boolean;
  followRedirects: 'global' | 'on' | 'off';
  cookies: { send: boolean; store: boolean };
  rebuildPath: boolean;
}

export interface InsomniaRequest {
  url: string;
  name: string;
  meta: ItemMeta;
  method: string;
  body?: RequestBody;
  headers?: KeyValueEntry[];
  parameters?: KeyValueEntry[];
  settings: RequestSettings;
}

export interface BearerAuthentication {
  type: 'bearer';
  token: string;
}

export interface InsomniaFolder {
  name: string;
  meta: ItemMeta;
  children: InsomniaRequest[];
  authentication?: BearerAuthentication;
}

export interface CookieJar {
  name: string;
  meta: ItemMeta;
}

export interface SubEnvironment {
  name: string;
  meta: ItemMeta;
  data: Record<string, string>;
  color?: string;
}

export interface BaseEnvironment {
  name: string;
  meta: ItemMeta;
  data: Record<string, string>;
  subEnvironments: SubEnvironment[];
}

export interface InsomniaCollection {
  type: typeof COLLECTION_TYPE;
  name: string;
  meta: ItemMeta;
  collection: InsomniaFolder[];
  cookieJar: CookieJar;
  environments: BaseEnvironment;
}
