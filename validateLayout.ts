import {
  LETTER,
  widgetSize,
  type FieldDefinition,
  type FormLayout,
  type RadioDefinition,
} from "./formSpec.ts";

export class FormLayoutError extends Error {
  readonly layout: string;
  readonly field?: string;

  constructor(layout: string, message: string, field?: string) {
    super(field ? `${layout}: field "${field}" ${message}` : `${layout}: ${message}`);
    this.name = "FormLayoutError";
    this.layout = layout;
    this.field = field;
  }
}

/**
 * Checks the invariants of a layout before anything is drawn:
 * - names are unique, except radio widgets sharing a group
 * - every widget lies fully inside the page
 * - choice defaults are one of the option values (or empty)
 *
 * Throws FormLayoutError on the first violation.
 */
export function validateLayout(layout: FormLayout) {
  const [pageWidth, pageHeight] = layout.pageSize ?? LETTER;
  const fail = (message: string, field?: string): never => {
    throw new FormLayoutError(layout.fileName, message, field);
  };

  const kindByName = new Map<string, FieldDefinition["kind"]>();
  const radioGroups = new Map<string, RadioDefinition[]>();

  for (const field of layout.fields) {
    if (!field.name) fail("has a field without a name");

    const seen = kindByName.get(field.name);
    if (seen && (seen !== "radio" || field.kind !== "radio")) {
      fail("is defined more than once", field.name);
    }
    kindByName.set(field.name, field.kind);

    if (field.kind === "radio") {
      const group = radioGroups.get(field.name) ?? [];
      group.push(field);
      radioGroups.set(field.name, group);
    }

    const { width, height } = widgetSize(field);
    if (![field.x, field.y, width, height].every(Number.isFinite)) {
      fail("has a position or size that is not a finite number", field.name);
    }
    if (width <= 0 || height <= 0) fail("needs a positive width and height", field.name);
    if (field.x < 0 || field.y < 0 || field.x + width > pageWidth || field.y + height > pageHeight) {
      fail(`does not fit inside the ${pageWidth}x${pageHeight} page`, field.name);
    }

    switch (field.kind) {
      case "text":
        if (field.maxLength !== undefined) {
          if (!Number.isInteger(field.maxLength) || field.maxLength <= 0) {
            fail("has an invalid maxLength", field.name);
          }
          if (field.value && field.value.length > field.maxLength) {
            fail(`has a value longer than ${field.maxLength} characters`, field.name);
          }
        }
        break;
      case "choice": {
        if (field.options.length === 0) fail("has no options", field.name);
        const values = field.options.map((o) => o.value);
        if (new Set(values).size !== values.length) fail("has duplicate option values", field.name);
        if (field.value && !values.includes(field.value)) {
          fail(`defaults to "${field.value}", which is not an option`, field.name);
        }
        break;
      }
      default:
        break;
    }
  }

  for (const [name, widgets] of radioGroups) {
    const values = widgets.map((w) => w.value);
    if (values.some((v) => !v)) fail("has a radio option without a value", name);
    if (new Set(values).size !== values.length) fail("has duplicate radio values", name);
    if (widgets.filter((w) => w.selected).length > 1) fail("has more than one selected option", name);
  }
}
