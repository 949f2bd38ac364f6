export type FieldElement = HTMLInputElement | HTMLTextAreaElement | HTMLSelectElement;

export type InputValue = string | number | boolean | string[];

/**
 * Read the value a change event should store for this element
 *
 * - checkbox: `checked`
 * - number / range: a number, or `""` while the input is blank
 * - `<select multiple>`: the selected option values
 * - anything else: `value`
 */
export function readInputValue(element: FieldElement): InputValue {
  if (element instanceof HTMLInputElement) {
    if (element.type === "checkbox") return element.checked;
    if (element.type === "number" || element.type === "range") {
      return element.value === "" ? "" : Number(element.value);
    }
    return element.value;
  }
  if (element instanceof HTMLSelectElement && element.multiple) {
    return Array.from(element.selectedOptions, (option) => option.value);
  }
  return element.value;
}
