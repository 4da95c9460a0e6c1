// formSpec.ts
export type PageSize = [width: number, height: number];

/** US Letter, in points. */
export const LETTER: PageSize = [612, 792];

/** 0..1 floats */
export type Color = { r: number; g: number; b: number };

export type BorderStyle = "solid" | "dashed" | "beveled" | "inset" | "underline";

type FieldBase = {
  name: string;
  x: number;             // points, origin bottom-left
  y: number;             // points
  width?: number;
  height?: number;
  tooltip?: string;
  borderStyle?: BorderStyle;
  borderColor?: Color;
  fillColor?: Color;
  textColor?: Color;
  required?: boolean;
  readOnly?: boolean;
};

export type TextFieldDefinition = FieldBase & {
  kind: "text";
  value?: string;
  multiline?: boolean;
  password?: boolean;
  maxLength?: number;
};

export type CheckboxDefinition = FieldBase & {
  kind: "checkbox";
  checked?: boolean;
};

/** One widget of a radio group. Widgets sharing `name` form the group. */
export type RadioDefinition = FieldBase & {
  kind: "radio";
  value: string;         // export value of this widget
  selected?: boolean;
};

export type ChoiceOption = { value: string; label: string };

export type ChoiceDefinition = FieldBase & {
  kind: "choice";
  options: ChoiceOption[];
  value?: string;        // must match an option value, or be empty
};

export type ButtonDefinition = FieldBase & {
  kind: "button";
  label: string;
};

export type FieldDefinition =
  | TextFieldDefinition
  | CheckboxDefinition
  | RadioDefinition
  | ChoiceDefinition
  | ButtonDefinition;

export type TextItem = {
  type: "text";
  text: string;
  x: number;
  y: number;
  size: number;
  weight?: "regular" | "bold";
};

export type RuleItem = {
  type: "rule";
  x1: number;
  x2: number;
  y: number;
  thickness?: number;
};

export type StaticItem = TextItem | RuleItem;

export type FormLayout = {
  fileName: string;
  description: string;   // shown in the summary after generation
  pageSize?: PageSize;
  items: StaticItem[];
  fields: FieldDefinition[];
};

/** Checkbox and radio widgets have no intrinsic size in the tables. */
export const DEFAULT_BUTTON_SIZE = 20;

export function widgetSize(field: FieldDefinition) {
  const fallback =
    field.kind === "checkbox" || field.kind === "radio" ? DEFAULT_BUTTON_SIZE : undefined;
  return {
    width: field.width ?? fallback ?? 0,
    height: field.height ?? fallback ?? 0,
  };
}
