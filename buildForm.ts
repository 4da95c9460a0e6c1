import {
  PDFDict,
  PDFDocument,
  PDFHexString,
  PDFName,
  PDFRadioGroup,
  StandardFonts,
  rgb,
  type PDFField,
  type PDFFont,
  type PDFPage,
  type PDFWidgetAnnotation,
} from "pdf-lib";
import type { FieldAppearanceOptions } from "pdf-lib/cjs/api/form/PDFField";
import fontkit from "@pdf-lib/fontkit";
import fs from "node:fs/promises";

import {
  LETTER,
  widgetSize,
  type BorderStyle,
  type ChoiceDefinition,
  type Color,
  type FieldDefinition,
  type FormLayout,
  type StaticItem,
} from "./formSpec.ts";
import { validateLayout } from "./validateLayout.ts";

export type BuildOptions = {
  /** Path to a .ttf/.otf font used for labels and field text. */
  fontPath?: string;
};

type Fonts = { regular: PDFFont; bold: PDFFont };

const BORDER_STYLE_CODES: Record<BorderStyle, string> = {
  solid: "S",
  dashed: "D",
  beveled: "B",
  inset: "I",
  underline: "U",
};

const black: Color = { r: 0, g: 0, b: 0 };
const white: Color = { r: 1, g: 1, b: 1 };

/** Render a layout into the bytes of a one-page PDF with an AcroForm. */
export async function buildFormPdfBytes(
  layout: FormLayout,
  options: BuildOptions = {}
): Promise<Uint8Array> {
  validateLayout(layout);

  const pdfDoc = await PDFDocument.create();
  const fonts = await embedFonts(pdfDoc, options.fontPath);
  const page = pdfDoc.addPage(layout.pageSize ?? LETTER);

  for (const item of layout.items) {
    drawStaticItem(page, item, fonts);
  }

  for (const field of layout.fields) {
    placeField(pdfDoc, page, field, fonts.regular);
  }

  const form = pdfDoc.getForm();
  form.updateFieldAppearances(fonts.regular);
  for (const field of form.getFields()) {
    if (field instanceof PDFRadioGroup) nameRadioStates(field);
  }

  // appearances are final; regenerating them would undo the radio state names
  return await pdfDoc.save({ updateFieldAppearances: false });
}

/** Render a layout and write it to `outputPath`, replacing any existing file. */
export async function writeFormPdf(
  layout: FormLayout,
  outputPath: string,
  options: BuildOptions = {}
) {
  const outBytes = await buildFormPdfBytes(layout, options);
  await fs.writeFile(outputPath, outBytes);
}

async function embedFonts(pdfDoc: PDFDocument, fontPath?: string): Promise<Fonts> {
  if (fontPath) {
    // Needed for embedding custom fonts (TTF/OTF)
    pdfDoc.registerFontkit(fontkit);
    const fontBytes = await fs.readFile(fontPath);
    const font = await pdfDoc.embedFont(fontBytes);
    return { regular: font, bold: font };
  }
  return {
    regular: await pdfDoc.embedFont(StandardFonts.Helvetica),
    bold: await pdfDoc.embedFont(StandardFonts.HelveticaBold),
  };
}

function toRgb(c: Color) {
  return rgb(c.r, c.g, c.b);
}

function drawStaticItem(page: PDFPage, item: StaticItem, fonts: Fonts) {
  if (item.type === "rule") {
    page.drawLine({
      start: { x: item.x1, y: item.y },
      end: { x: item.x2, y: item.y },
      thickness: item.thickness ?? 1,
      color: toRgb(black),
    });
    return;
  }
  page.drawText(item.text, {
    x: item.x,
    y: item.y,
    size: item.size,
    font: item.weight === "bold" ? fonts.bold : fonts.regular,
    color: toRgb(black),
  });
}

function placeField(pdfDoc: PDFDocument, page: PDFPage, def: FieldDefinition, font: PDFFont) {
  const { width, height } = widgetSize(def);
  const appearance: FieldAppearanceOptions = {
    x: def.x,
    y: def.y,
    width,
    height,
    font,
    textColor: toRgb(def.textColor ?? black),
    backgroundColor: toRgb(def.fillColor ?? white),
    borderColor: toRgb(def.borderColor ?? black),
    borderWidth: 1,
  };

  const field = createField(pdfDoc, page, def, appearance);

  if (def.required) field.enableRequired();
  if (def.readOnly) field.enableReadOnly();
  if (def.tooltip) {
    field.acroField.dict.set(PDFName.of("TU"), PDFHexString.fromText(def.tooltip));
  }

  const widgets = field.acroField.getWidgets();
  const widget = widgets[widgets.length - 1];
  if (widget && def.borderStyle) {
    setBorderStyle(pdfDoc, widget, def.borderStyle, appearance.borderWidth ?? 1);
  }
}

function createField(
  pdfDoc: PDFDocument,
  page: PDFPage,
  def: FieldDefinition,
  appearance: FieldAppearanceOptions
): PDFField {
  const form = pdfDoc.getForm();

  switch (def.kind) {
    case "text": {
      const tf = form.createTextField(def.name);
      if (def.maxLength !== undefined) tf.setMaxLength(def.maxLength);
      if (def.multiline) tf.enableMultiline();
      if (def.password) tf.enablePassword();
      if (def.value) tf.setText(def.value);
      tf.addToPage(page, appearance);
      return tf;
    }
    case "checkbox": {
      const cb = form.createCheckBox(def.name);
      cb.addToPage(page, appearance);
      if (def.checked) cb.check();
      return cb;
    }
    case "radio": {
      // widgets sharing a name join one group
      const group = form.getFieldMaybe(def.name)
        ? form.getRadioGroup(def.name)
        : form.createRadioGroup(def.name);
      group.addOptionToPage(def.value, page, appearance);
      if (def.selected) group.select(def.value);
      return group;
    }
    case "choice":
      return placeDropdown(pdfDoc, page, def, appearance);
    case "button": {
      const button = form.createButton(def.name);
      button.addToPage(def.label, page, appearance);
      return button;
    }
  }
}

/**
 * pdf-lib's dropdown API only knows plain strings and validates values against
 * the labels, so the `[export, label]` pairs go straight into /Opt and the
 * default into /V. The widget face is drawn while /V briefly holds the label.
 */
function placeDropdown(
  pdfDoc: PDFDocument,
  page: PDFPage,
  def: ChoiceDefinition,
  appearance: FieldAppearanceOptions
) {
  const dropdown = pdfDoc.getForm().createDropdown(def.name);
  dropdown.acroField.setOptions(
    def.options.map((o) => ({
      value: PDFHexString.fromText(o.value),
      display: PDFHexString.fromText(o.label),
    }))
  );

  const selected = def.options.find((o) => o.value === def.value);
  if (selected && def.value) {
    dropdown.acroField.dict.set(PDFName.of("V"), PDFHexString.fromText(selected.label));
  }
  dropdown.addToPage(page, appearance);
  if (selected && def.value) {
    dropdown.acroField.dict.set(PDFName.of("V"), PDFHexString.fromText(def.value));
  }
  pdfDoc.getForm().markFieldAsClean(dropdown.ref);
  return dropdown;
}

/**
 * pdf-lib names radio on-states by widget index and keeps the export values in
 * /Opt. Rename each on-state to its export value so /V and /AS carry it, and
 * drop /Opt.
 */
function nameRadioStates(group: PDFRadioGroup) {
  const exportValues = group.getOptions();
  const current = group.acroField.dict.get(PDFName.of("V"));

  group.acroField.getWidgets().forEach((widget, idx) => {
    const onValue = widget.getOnValue();
    const exportValue = exportValues[idx];
    if (!onValue || exportValue === undefined) return;

    const stateName = PDFName.of(exportValue);
    const ap = widget.dict.lookupMaybe(PDFName.of("AP"), PDFDict);
    for (const key of ["N", "D"]) {
      const states = ap?.lookupMaybe(PDFName.of(key), PDFDict);
      const stream = states?.get(onValue);
      if (!states || !stream) continue;
      states.delete(onValue);
      states.set(stateName, stream);
    }

    if (widget.getAppearanceState() === onValue) widget.setAppearanceState(stateName);
    if (current === onValue) group.acroField.dict.set(PDFName.of("V"), stateName);
  });

  group.acroField.dict.delete(PDFName.of("Opt"));
}

function setBorderStyle(
  pdfDoc: PDFDocument,
  widget: PDFWidgetAnnotation,
  style: BorderStyle,
  width: number
) {
  widget.dict.set(PDFName.of("BS"), pdfDoc.context.obj({ W: width, S: BORDER_STYLE_CODES[style] }));
}
