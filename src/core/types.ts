export type ExtensionKind = "page" | "widget";

export const EXTENSION_KINDS: readonly ExtensionKind[] = ["page", "widget"];

export interface ExtensionRecord {
  id: string;
  kind: ExtensionKind;
  enabled: boolean;
}

export type UnitLayer = "primary" | "extension";

export interface Vocation {
  id: number;
  clientId: number;
  name: string;
  description: string;
  fromVocation: number;
}

export interface TownPosition {
  x: number;
  y: number;
  z: number;
}

export interface Town {
  id: number;
  name: string;
  templePosition: TownPosition | null;
}

export interface WorldData {
  vocations: Vocation[];
  towns: Town[];
}

export type ColumnValue = string | number | boolean | null;
