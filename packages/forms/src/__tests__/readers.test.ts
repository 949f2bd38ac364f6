import { readInputValue } from "../controlled/readInputValue";
import { readFieldValue } from "../uncontrolled/readFieldValue";

function buildForm(markup: string): HTMLFormElement {
  const form = document.createElement("form");
  form.innerHTML = markup;
  document.body.appendChild(form);
  return form;
}

function byName<T extends Element>(form: HTMLFormElement, name: string, type: new () => T): T {
  const element = form.querySelector(`[name="${name}"]`);
  if (!(element instanceof type)) {
    throw new Error(`No ${type.name} named ${name}`);
  }
  return element;
}

afterEach(() => {
  document.body.innerHTML = "";
});

describe("readInputValue", () => {
  it("should read text, checkbox and number inputs", () => {
    const form = buildForm(`
      <input name="title" value="Hello" />
      <input name="agree" type="checkbox" checked />
      <input name="count" type="number" value="7" />
      <input name="blank" type="number" value="" />
    `);

    expect(readInputValue(byName(form, "title", HTMLInputElement))).toBe("Hello");
    expect(readInputValue(byName(form, "agree", HTMLInputElement))).toBe(true);
    expect(readInputValue(byName(form, "count", HTMLInputElement))).toBe(7);
    expect(readInputValue(byName(form, "blank", HTMLInputElement))).toBe("");
  });

  it("should read every selected option of a multi-select", () => {
    const form = buildForm(`
      <select name="tags" multiple>
        <option value="a" selected>A</option>
        <option value="b">B</option>
        <option value="c" selected>C</option>
      </select>
    `);

    expect(readInputValue(byName(form, "tags", HTMLSelectElement))).toEqual(["a", "c"]);
  });

  it("should read textareas", () => {
    const form = buildForm(`<textarea name="bio">About me</textarea>`);
    expect(readInputValue(byName(form, "bio", HTMLTextAreaElement))).toBe("About me");
  });
});

describe("readFieldValue", () => {
  it("should read single controls by name", () => {
    const form = buildForm(`
      <input name="email" value="user@example.com" />
      <input name="subscribe" type="checkbox" />
      <select name="plan"><option value="free">Free</option><option value="pro" selected>Pro</option></select>
      <textarea name="message">Hi there</textarea>
    `);

    expect(readFieldValue(form, "email")).toBe("user@example.com");
    expect(readFieldValue(form, "subscribe")).toBe(false);
    expect(readFieldValue(form, "plan")).toBe("pro");
    expect(readFieldValue(form, "message")).toBe("Hi there");
  });

  it("should read the checked radio of a group", () => {
    const form = buildForm(`
      <input name="size" type="radio" value="s" />
      <input name="size" type="radio" value="m" checked />
      <input name="size" type="radio" value="l" />
    `);

    expect(readFieldValue(form, "size")).toBe("m");
  });

  it("should read a lone radio as its value only when checked", () => {
    const form = buildForm(`
      <input name="plan" type="radio" value="pro" />
      <input name="terms" type="radio" value="yes" checked />
    `);

    expect(readFieldValue(form, "plan")).toBe("");
    expect(readFieldValue(form, "terms")).toBe("yes");
  });

  it("should read the checked values of a checkbox group", () => {
    const form = buildForm(`
      <input name="topics" type="checkbox" value="news" checked />
      <input name="topics" type="checkbox" value="offers" />
      <input name="topics" type="checkbox" value="events" checked />
    `);

    expect(readFieldValue(form, "topics")).toEqual(["news", "events"]);
  });

  it("should return undefined for a missing control", () => {
    const form = buildForm(`<input name="email" />`);
    expect(readFieldValue(form, "phone")).toBeUndefined();
  });
});
