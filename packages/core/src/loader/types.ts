/**
 * Shape of a schema document as validated by schema-document.schema.json
 */

import type { Status } from '../model/schema-node.js';

interface RawNodeBase {
  name: string;
  status?: Status;
  config?: boolean;
  ifFeatures?: string[];
  description?: string;
}

export interface RawContainer extends RawNodeBase {
  kind: 'container';
  presence?: boolean;
  children?: RawDataNode[];
  actions?: RawOperation[];
}

export interface RawList extends RawNodeBase {
  kind: 'list';
  key?: string[];
  children?: RawDataNode[];
  actions?: RawOperation[];
}

export interface RawLeaf extends RawNodeBase {
  kind: 'leaf';
  type: string;
  path?: string;
  mandatory?: boolean;
}

export interface RawLeafList extends RawNodeBase {
  kind: 'leaf-list';
  type: string;
  path?: string;
}

export interface RawChoice extends RawNodeBase {
  kind: 'choice';
  mandatory?: boolean;
  children?: Array<RawCase | RawDataNode>;
}

export interface RawCase extends RawNodeBase {
  kind: 'case';
  children?: RawDataNode[];
}

export interface RawAny extends RawNodeBase {
  kind: 'anydata' | 'anyxml';
  mandatory?: boolean;
}

export interface RawOperation extends RawNodeBase {
  kind?: 'rpc' | 'action';
  input?: RawDataNode[];
  output?: RawDataNode[];
}

export interface RawAction extends RawOperation {
  kind: 'action';
}

export interface RawNotification extends RawNodeBase {
  children?: RawDataNode[];
}

export type RawDataNode =
  | RawContainer
  | RawList
  | RawLeaf
  | RawLeafList
  | RawChoice
  | RawAny;

export interface RawAugment {
  target: string;
  ifFeatures?: string[];
  description?: string;
  nodes: Array<RawDataNode | RawCase | RawAction>;
}

export interface RawImport {
  module: string;
  prefix: string;
  revision?: string;
}

export interface RawModule {
  name: string;
  prefix: string;
  namespace: string;
  revision?: string;
  description?: string;
  imports?: RawImport[];
  features?: string[];
  data?: RawDataNode[];
  rpcs?: RawOperation[];
  notifications?: RawNotification[];
  augments?: RawAugment[];
}

export interface RawSchemaDocument {
  $schema?: string;
  modules: RawModule[];
}
