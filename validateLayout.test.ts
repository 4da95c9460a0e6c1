import { describe, expect, it } from "vitest";
import { basicForm, choiceFieldsForm, mixedForm, textFieldsForm } from "./fieldMap.ts";
import type { FieldDefinition, FormLayout } from "./formSpec.ts";
import { FormLayoutError, validateLayout } from "./validateLayout.ts";

function layoutOf(fields: FieldDefinition[]): FormLayout {
  return { fileName: "demo.pdf", description: "demo", items: [], fields };
}

function messageOf(layout: FormLayout) {
  try {
    validateLayout(layout);
  } catch (err) {
    if (err instanceof FormLayoutError) return err.message;
    throw err;
  }
  return undefined;
}

describe("validateLayout", () => {
  it("accepts every canned layout", () => {
    for (const layout of [basicForm, textFieldsForm, choiceFieldsForm, mixedForm(new Date(2024, 0, 1))]) {
      expect(() => validateLayout(layout)).not.toThrow();
    }
  });

  it("rejects duplicate field names", () => {
    const layout = layoutOf([
      { kind: "text", name: "a", x: 10, y: 10, width: 100, height: 20 },
      { kind: "checkbox", name: "a", x: 10, y: 50 },
    ]);

    expect(messageOf(layout)).toBe('demo.pdf: field "a" is defined more than once');
  });

  it("allows radio widgets to share a group name", () => {
    const layout = layoutOf([
      { kind: "radio", name: "g", value: "one", x: 10, y: 10 },
      { kind: "radio", name: "g", value: "two", x: 40, y: 10 },
    ]);

    expect(messageOf(layout)).toBeUndefined();
  });

  it("rejects a non-radio field reusing a radio group name", () => {
    const layout = layoutOf([
      { kind: "radio", name: "g", value: "one", x: 10, y: 10 },
      { kind: "text", name: "g", x: 40, y: 10, width: 100, height: 20 },
    ]);

    expect(messageOf(layout)).toBe('demo.pdf: field "g" is defined more than once');
  });

  it("rejects radio groups with repeated values or two selections", () => {
    expect(
      messageOf(
        layoutOf([
          { kind: "radio", name: "g", value: "one", x: 10, y: 10 },
          { kind: "radio", name: "g", value: "one", x: 40, y: 10 },
        ])
      )
    ).toBe('demo.pdf: field "g" has duplicate radio values');

    expect(
      messageOf(
        layoutOf([
          { kind: "radio", name: "g", value: "one", selected: true, x: 10, y: 10 },
          { kind: "radio", name: "g", value: "two", selected: true, x: 40, y: 10 },
        ])
      )
    ).toBe('demo.pdf: field "g" has more than one selected option');
  });

  it("uses a 20pt box for checkboxes when checking page bounds", () => {
    expect(messageOf(layoutOf([{ kind: "checkbox", name: "c", x: 592, y: 772 }]))).toBeUndefined();
    expect(messageOf(layoutOf([{ kind: "checkbox", name: "c", x: 593, y: 10 }]))).toBe(
      'demo.pdf: field "c" does not fit inside the 612x792 page'
    );
  });

  it("checks bounds against a custom page size", () => {
    const layout: FormLayout = {
      ...layoutOf([{ kind: "text", name: "t", x: 10, y: 10, width: 300, height: 20 }]),
      pageSize: [200, 200],
    };

    expect(messageOf(layout)).toBe('demo.pdf: field "t" does not fit inside the 200x200 page');
  });

  it("rejects coordinates that are not finite numbers", () => {
    expect(messageOf(layoutOf([{ kind: "checkbox", name: "c", x: Number.NaN, y: 10 }]))).toBe(
      'demo.pdf: field "c" has a position or size that is not a finite number'
    );
    expect(
      messageOf(layoutOf([{ kind: "text", name: "t", x: 10, y: 10, width: Infinity, height: 20 }]))
    ).toBe('demo.pdf: field "t" has a position or size that is not a finite number');
  });

  it("requires a size for text fields", () => {
    expect(messageOf(layoutOf([{ kind: "text", name: "t", x: 10, y: 10 }]))).toBe(
      'demo.pdf: field "t" needs a positive width and height'
    );
  });

  it("rejects a preset value longer than maxLength", () => {
    const layout = layoutOf([
      { kind: "text", name: "t", x: 10, y: 10, width: 100, height: 20, maxLength: 3, value: "1234" },
    ]);

    expect(messageOf(layout)).toBe('demo.pdf: field "t" has a value longer than 3 characters');
  });

  it("rejects a choice default that is not an option", () => {
    const layout = layoutOf([
      {
        kind: "choice",
        name: "c",
        x: 10, y: 10, width: 100, height: 20,
        value: "zz",
        options: [{ value: "aa", label: "A" }],
      },
    ]);

    expect(messageOf(layout)).toBe('demo.pdf: field "c" defaults to "zz", which is not an option');
  });

  it("accepts an empty choice default", () => {
    const layout = layoutOf([
      {
        kind: "choice",
        name: "c",
        x: 10, y: 10, width: 100, height: 20,
        value: "",
        options: [{ value: "aa", label: "A" }],
      },
    ]);

    expect(messageOf(layout)).toBeUndefined();
  });

  it("exposes the layout and field on the error", () => {
    const layout = layoutOf([{ kind: "choice", name: "c", x: 10, y: 10, width: 100, height: 20, options: [] }]);

    let caught: unknown;
    try {
      validateLayout(layout);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(FormLayoutError);
    expect(caught).toMatchObject({ layout: "demo.pdf", field: "c", name: "FormLayoutError" });
  });
});
