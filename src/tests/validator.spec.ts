import { describe, it, expect } from "vitest";
import { formatValidationFailure, validateParameters } from "../dispatch/validator";
import type { ParamSchema } from "../types/mcp";

const spec = (type: ParamSchema[string]["type"], required = false) => ({ type, required, description: "" });

describe("validateParameters", () => {
  it("reports a missing required parameter by name", () => {
    expect(validateParameters({}, { msg: spec("string", true) })).toEqual({
      ok: false,
      param: "msg",
      reason: "required parameter missing",
    });
  });

  it("accepts a present required parameter of the right type", () => {
    expect(validateParameters({ msg: "hi" }, { msg: spec("string", true) })).toEqual({ ok: true });
  });

  it("skips absent optional parameters", () => {
    expect(validateParameters({}, { limit: spec("integer") })).toEqual({ ok: true });
  });

  it("passes undeclared input keys through", () => {
    expect(validateParameters({ extra: [1, 2], msg: "hi" }, { msg: spec("string", true) })).toEqual({ ok: true });
  });

  it("treats 5.0 as an integer but not 5.5 or '5'", () => {
    const schema = { n: spec("integer") };
    expect(validateParameters({ n: 5.0 }, schema)).toEqual({ ok: true });
    expect(validateParameters({ n: 5.5 }, schema)).toEqual({ ok: false, param: "n", reason: "must be an integer" });
    expect(validateParameters({ n: "5" }, schema)).toEqual({ ok: false, param: "n", reason: "must be an integer" });
  });

  it("accepts integers where a number is declared", () => {
    expect(validateParameters({ n: 3 }, { n: spec("number") })).toEqual({ ok: true });
    expect(validateParameters({ n: 0.25 }, { n: spec("number") })).toEqual({ ok: true });
    expect(validateParameters({ n: "3" }, { n: spec("number") })).toEqual({ ok: false, param: "n", reason: "must be a number" });
  });

  it("checks booleans, arrays and objects", () => {
    expect(validateParameters({ b: "true" }, { b: spec("boolean") })).toEqual({ ok: false, param: "b", reason: "must be a boolean" });
    expect(validateParameters({ a: {} }, { a: spec("array") })).toEqual({ ok: false, param: "a", reason: "must be an array" });
    expect(validateParameters({ o: [] }, { o: spec("object") })).toEqual({ ok: false, param: "o", reason: "must be an object" });
    expect(validateParameters({ o: null }, { o: spec("object") })).toEqual({ ok: false, param: "o", reason: "must be an object" });
    expect(validateParameters({ a: [1], o: { k: 1 }, b: false }, { a: spec("array"), o: spec("object"), b: spec("boolean") })).toEqual({ ok: true });
  });

  it("does not look inside array elements", () => {
    const schema: ParamSchema = {
      ids: { type: "array", required: false, description: "", items: { type: "integer", required: false, description: "" } },
    };
    expect(validateParameters({ ids: ["x", 1.5] }, schema)).toEqual({ ok: true });
  });

  it("counts null as present, failing the type check", () => {
    expect(validateParameters({ msg: null }, { msg: spec("string", true) })).toEqual({
      ok: false,
      param: "msg",
      reason: "must be a string",
    });
  });

  it("stops at the first failing parameter", () => {
    const schema = { a: spec("string", true), b: spec("number", true) };
    expect(validateParameters({}, schema)).toEqual({ ok: false, param: "a", reason: "required parameter missing" });
  });
});

describe("formatValidationFailure", () => {
  it("names the parameter in both kinds of failure", () => {
    expect(formatValidationFailure("msg", "required parameter missing")).toBe(
      "Parameter validation failed: required parameter missing: msg"
    );
    expect(formatValidationFailure("n", "must be an integer")).toBe(
      "Parameter validation failed: parameter n must be an integer"
    );
  });
});
