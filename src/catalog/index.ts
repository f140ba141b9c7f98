// src/catalog/index.ts
// The default catalog. Order matters: it sets the help listing and the
// order in which pattern actions are tried (format setters before recall).

import type { ConversionRule } from "../core/units/converter";
import type { ActionDescriptor } from "../registry/types";
import conversionsData from "./data/conversions.json";
import { arithmeticActions } from "./arithmetic";
import { constantActions } from "./constants";
import { decibelActions } from "./decibels";
import { formatActions } from "./formats";
import { hyperbolicActions } from "./hyperbolic";
import { miscActions } from "./misc";
import { powerActions } from "./powers";
import { stackActions } from "./stack";
import { trigActions } from "./trig";
import { variableActions } from "./variables";
import { vectorActions } from "./vector";

export function defaultCatalog(): ActionDescriptor[] {
  return [
    ...arithmeticActions,
    ...powerActions,
    ...trigActions,
    ...vectorActions,
    ...hyperbolicActions,
    ...decibelActions,
    ...constantActions(),
    ...formatActions,
    ...variableActions,
    ...stackActions,
    ...miscActions,
  ];
}

export const DEFAULT_CONVERSIONS: readonly ConversionRule[] = conversionsData;

export { interpolate, ABOUT_TEXT } from "./misc";
export { parseConstants, type ConstantSpec } from "./constants";
