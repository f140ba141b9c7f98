// src/catalog/vector.ts
// Complex and vector functions

import * as C from "../core/values/complex";
import type { KeyedAction } from "../registry/types";
import { angleUnits, binary, commonUnits, fromRadians, keyed, realArg, realValue, toRadians, unary } from "./helpers";

const CATEGORY = "Complex and Vector Functions";

export const vectorActions: KeyedAction[] = [
  unary(CATEGORY, {
    key: "abs",
    aliases: ["mag"],
    summary: "magnitude of complex number",
    synopsis: "x, ... → abs(x), ...",
  }, x => realValue(C.abs(x.n), x.units)),

  unary(CATEGORY, {
    key: "arg",
    aliases: ["ph"],
    summary: "phase of complex number",
    synopsis: "x, ... → arg(x), ...",
  }, (x, state) => realValue(fromRadians(C.arg(x.n), state.mode), angleUnits(state.mode))),

  binary(CATEGORY, {
    key: "hypot",
    aliases: ["len"],
    summary: "hypotenuse",
    synopsis: "x, y, ... → sqrt(x**2+y**2), ...",
  }, (x, y) => realValue(Math.hypot(realArg(x, "hypot"), realArg(y, "hypot")), commonUnits(x, y))),

  binary(CATEGORY, {
    key: "atan2",
    aliases: ["angle"],
    summary: "two-argument arc tangent",
    synopsis: "x, y, ... → atan2(y,x), ...",
  }, (x, y, state) =>
    realValue(fromRadians(Math.atan2(realArg(y, "atan2"), realArg(x, "atan2")), state.mode), angleUnits(state.mode))),

  keyed(CATEGORY, {
    key: "rtop",
    summary: "convert rectangular to polar coordinates",
    synopsis: "x, y, ... → sqrt(x**2+y**2), atan2(y,x), ...",
    detail: "x and y are taken as the real and imaginary parts; x becomes the magnitude and y the angle.",
  }, { pop: 2, push: 2 }, ([x, y], state) => {
    const re = realArg(x, "rtop");
    const im = realArg(y, "rtop");
    return [
      realValue(Math.hypot(re, im), commonUnits(x, y)),
      realValue(fromRadians(Math.atan2(im, re), state.mode), angleUnits(state.mode)),
    ];
  }),

  keyed(CATEGORY, {
    key: "ptor",
    summary: "convert polar to rectangular coordinates",
    synopsis: "x, y, ... → x*cos(y), x*sin(y), ...",
    detail: "x is the magnitude and y the angle; both results keep the units of x.",
  }, { pop: 2, push: 2 }, ([x, y], state) => {
    const mag = realArg(x, "ptor");
    const phase = toRadians(realArg(y, "ptor"), state.mode);
    return [
      realValue(mag * Math.cos(phase), x.units),
      realValue(mag * Math.sin(phase), x.units),
    ];
  }),
];

