import { parseJsonPreservingFloats, PyFloat, pyRepr, pyStr } from "./python-format";

describe("pyRepr", () => {
  it("renders constants", () => {
    expect(pyRepr(true)).toBe("True");
    expect(pyRepr(false)).toBe("False");
    expect(pyRepr(null)).toBe("None");
  });

  it("renders numbers", () => {
    expect(pyRepr(5)).toBe("5");
    expect(pyRepr(-0.25)).toBe("-0.25");
    expect(pyRepr(Number.NaN)).toBe("nan");
    expect(pyRepr(-Infinity)).toBe("-inf");
  });

  it("renders floats the way repr() does", () => {
    expect(pyRepr(new PyFloat(1))).toBe("1.0");
    expect(pyRepr(new PyFloat(2.5))).toBe("2.5");
    expect(pyRepr(new PyFloat(0.0001))).toBe("0.0001");
    expect(pyRepr(new PyFloat(0.00001))).toBe("1e-05");
    expect(pyRepr(new PyFloat(1e16))).toBe("1e+16");
    expect(pyRepr(new PyFloat(1.5e20))).toBe("1.5e+20");
    expect(pyRepr(new PyFloat(-0))).toBe("-0.0");
    expect(pyRepr([new PyFloat(3), 3])).toBe("[3.0, 3]");
  });

  it("quotes strings", () => {
    expect(pyRepr("abc")).toBe("'abc'");
    expect(pyRepr("it's")).toBe(`"it's"`);
    expect(pyRepr(`it's "x"`)).toBe(`'it\\'s "x"'`);
    expect(pyRepr("a\nb")).toBe("'a\\nb'");
  });

  it("renders lists and dicts", () => {
    expect(pyRepr([1, "a", [true]])).toBe("[1, 'a', [True]]");
    expect(pyRepr({ k: null, n: 2 })).toBe("{'k': None, 'n': 2}");
  });
});

describe("pyStr", () => {
  it("leaves strings alone", () => {
    expect(pyStr("x y")).toBe("x y");
  });

  it("falls back to repr for everything else", () => {
    expect(pyStr(false)).toBe("False");
    expect(pyStr(3)).toBe("3");
    expect(pyStr(["a"])).toBe("['a']");
  });
});

describe("parseJsonPreservingFloats", () => {
  it("keeps numbers written as floats", () => {
    expect(parseJsonPreservingFloats('{"z": [1.0, 0.00001, 2, -3.5e2]}')).toEqual({
      z: [new PyFloat(1), new PyFloat(0.00001), 2, new PyFloat(-350)],
    });
  });
});
