// fieldMap.ts
import type {
  ChoiceOption,
  Color,
  FieldDefinition,
  FormLayout,
  StaticItem,
} from "./formSpec.ts";

const black: Color = { r: 0, g: 0, b: 0 };
const pink: Color = { r: 1, g: 0.7529, b: 0.7961 };
const green: Color = { r: 0, g: 0.502, b: 0 };
const magenta: Color = { r: 1, g: 0, b: 1 };

function label(text: string, x: number, y: number, size = 12): StaticItem {
  return { type: "text", text, x, y, size };
}

/** Title line plus the rule drawn under it, shared by every layout. */
function heading(text: string, size = 12, weight: "regular" | "bold" = "regular"): StaticItem[] {
  return [
    { type: "text", text, x: 50, y: 750, size, weight },
    { type: "rule", x1: 50, x2: 550, y: 745 },
  ];
}

const pinkBox = {
  borderStyle: "inset",
  textColor: black,
  fillColor: pink,
  borderColor: black,
} as const;

export const basicForm: FormLayout = {
  fileName: "basic-form.pdf",
  description: "Simple form with basic field types",
  items: [
    ...heading("Basic Form Example"),
    label("Name:", 50, 700),
    label("Email:", 50, 650),
    label("Subscribe:", 50, 600),
    label("Gender:", 50, 550),
    label("Male", 175, 550),
    label("Female", 275, 550),
    label("Country:", 50, 500),
    label("Note: Submit buttons would go here in a real form", 50, 400),
  ],
  fields: [
    { kind: "text", name: "name", tooltip: "Enter your name", x: 150, y: 695, width: 300, height: 20, ...pinkBox },
    { kind: "text", name: "email", tooltip: "Enter your email", x: 150, y: 645, width: 300, height: 20, ...pinkBox },
    { kind: "checkbox", name: "subscribe", tooltip: "Check to subscribe", x: 150, y: 598, borderColor: black, fillColor: green, textColor: black },
    { kind: "radio", name: "gender", value: "male", tooltip: "Select gender", x: 150, y: 548, borderStyle: "solid", borderColor: black, fillColor: magenta, textColor: black },
    { kind: "radio", name: "gender", value: "female", tooltip: "Select gender", x: 250, y: 548, borderStyle: "solid", borderColor: black, fillColor: magenta, textColor: black },
    {
      kind: "choice",
      name: "country",
      tooltip: "Select your country",
      value: "us",
      x: 150, y: 495, width: 200, height: 20,
      options: [
        { value: "us", label: "United States" },
        { value: "ca", label: "Canada" },
        { value: "uk", label: "United Kingdom" },
      ],
      borderColor: black,
      fillColor: pink,
      textColor: black,
    },
  ],
};

export const textFieldsForm: FormLayout = {
  fileName: "text-fields.pdf",
  description: "Various text field configurations",
  items: [
    ...heading("Text Field Examples"),
    label("Regular Text:", 50, 700),
    label("Required Field:", 50, 650),
    label("Max 10 chars:", 50, 600),
    label("Comments:", 50, 550),
    label("Password:", 50, 430),
    label("Read-only:", 50, 380),
  ],
  fields: [
    { kind: "text", name: "regularText", tooltip: "Regular text field", x: 200, y: 695, width: 250, height: 20, borderStyle: "inset" },
    { kind: "text", name: "requiredField", tooltip: "This field is required", x: 200, y: 645, width: 250, height: 20, borderStyle: "inset", required: true },
    { kind: "text", name: "maxLengthField", tooltip: "Maximum 10 characters", x: 200, y: 595, width: 150, height: 20, borderStyle: "inset", maxLength: 10 },
    { kind: "text", name: "comments", tooltip: "Multiline text field", x: 200, y: 470, width: 250, height: 75, borderStyle: "inset", multiline: true },
    { kind: "text", name: "password", tooltip: "Password field", x: 200, y: 425, width: 250, height: 20, borderStyle: "inset", password: true },
    { kind: "text", name: "readOnly", tooltip: "Read-only field", x: 200, y: 375, width: 250, height: 20, borderStyle: "inset", readOnly: true, value: "This cannot be changed" },
  ],
};

const states: ChoiceOption[] = [
  { value: "", label: "-- Select State --" },
  { value: "AL", label: "Alabama" },
  { value: "AK", label: "Alaska" },
  { value: "AZ", label: "Arizona" },
  { value: "AR", label: "Arkansas" },
  { value: "CA", label: "California" },
  { value: "CO", label: "Colorado" },
  { value: "CT", label: "Connecticut" },
  { value: "DE", label: "Delaware" },
  { value: "FL", label: "Florida" },
  { value: "GA", label: "Georgia" },
  { value: "HI", label: "Hawaii" },
];

const sizes = [
  { label: "S", offset: 50 },
  { label: "M", offset: 100 },
  { label: "L", offset: 150 },
  { label: "XL", offset: 200 },
];

const features = [
  { name: "feature1", label: "Feature 1", offset: 0 },
  { name: "feature2", label: "Feature 2", offset: 100 },
  { name: "feature3", label: "Feature 3", offset: 200 },
];

export const choiceFieldsForm: FormLayout = {
  fileName: "choice-fields.pdf",
  description: "Dropdowns, radio buttons, and checkboxes",
  items: [
    ...heading("Choice Field Examples"),
    label("Simple Dropdown:", 50, 700),
    label("State:", 50, 650),
    label("Size:", 50, 590),
    ...sizes.map((s) => label(s.label, 170 + s.offset, 590)),
    label("Features:", 50, 540),
    ...features.map((f) => label(f.label, 170 + f.offset, 540)),
  ],
  fields: [
    {
      kind: "choice",
      name: "simpleDropdown",
      tooltip: "Select an option",
      value: "opt1",
      x: 200, y: 695, width: 200, height: 20,
      options: [
        { value: "opt1", label: "Option 1" },
        { value: "opt2", label: "Option 2" },
        { value: "opt3", label: "Option 3" },
      ],
    },
    { kind: "choice", name: "state", tooltip: "Select your state", value: "", x: 200, y: 645, width: 200, height: 20, options: states },
    ...sizes.map((s): FieldDefinition => ({
      kind: "radio",
      name: "size",
      tooltip: `Size ${s.label}`,
      value: s.label.toLowerCase(),
      selected: s.label === "M",
      x: 150 + s.offset,
      y: 588,
    })),
    ...features.map((f): FieldDefinition => ({
      kind: "checkbox",
      name: f.name,
      tooltip: f.label,
      x: 150 + f.offset,
      y: 538,
    })),
  ],
};

function pad(n: number) {
  return String(n).padStart(2, "0");
}

/** `YYYY-MM-DD HH:MM:SS` in local time. */
export function formatTimestamp(date: Date) {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

/** The registration form carries a footer with the generation time. */
export function mixedForm(generatedAt: Date): FormLayout {
  return {
    fileName: "mixed-form.pdf",
    description: "Realistic form with mixed field types",
    items: [
      ...heading("Registration Form", 14, "bold"),
      label("First Name:", 50, 720, 11),
      label("Last Name:", 300, 720, 11),
      label("Email:", 50, 680, 11),
      label("Age:", 50, 640, 11),
      label("Country:", 200, 640, 11),
      label("Subscribe to newsletter:", 50, 600, 11),
      label("I agree to the terms and conditions:", 50, 570, 11),
      label("Note: Submit button would go here in a real form", 50, 500, 11),
      label(`Form generated on ${formatTimestamp(generatedAt)}`, 50, 50, 8),
    ],
    fields: [
      { kind: "text", name: "firstName", x: 130, y: 715, width: 150, height: 20, borderStyle: "inset", required: true },
      { kind: "text", name: "lastName", x: 380, y: 715, width: 150, height: 20, borderStyle: "inset", required: true },
      { kind: "text", name: "emailAddress", x: 130, y: 675, width: 400, height: 20, borderStyle: "inset", required: true },
      { kind: "text", name: "age", x: 130, y: 635, width: 50, height: 20, borderStyle: "inset", maxLength: 3 },
      {
        kind: "choice",
        name: "countrySelect",
        value: "",
        x: 280, y: 635, width: 150, height: 20,
        options: [
          { value: "", label: "-- Select --" },
          { value: "us", label: "United States" },
          { value: "ca", label: "Canada" },
          { value: "mx", label: "Mexico" },
          { value: "uk", label: "United Kingdom" },
          { value: "de", label: "Germany" },
          { value: "fr", label: "France" },
        ],
      },
      { kind: "checkbox", name: "newsletter", x: 200, y: 598 },
      { kind: "checkbox", name: "terms", x: 250, y: 568, required: true },
    ],
  };
}
