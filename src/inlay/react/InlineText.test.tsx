import { renderToStaticMarkup } from "react-dom/server";
import { describe, expect, it } from "vitest";
import { createInlineObjectCodec } from "../core/codec/inline-object-codec";
import { EditingController } from "../core/controller";
import { collapsedSelection, createEditingValue } from "../core/editing-value";
import { buildSpans } from "../core/spans/span-builder";
import { InlineText, textStyleToCss, verticalAlignFor } from "./InlineText";
import { useEditingValue } from "./useEditingValue";

type Picture = { label: string; src: string };

const codec = createInlineObjectCodec<Picture>((codePoint) =>
  codePoint === 0xe001 ? { label: "Smile", src: "smile.png" } : null,
);

const renderPicture = (picture: Picture) => <img alt={picture.label} src={picture.src} />;

describe("InlineText", () => {
  it("underlines the composing run and wraps inline objects", () => {
    const spans = buildSpans("ab\uE001", { codec, composing: { start: 0, end: 2 } });
    const markup = renderToStaticMarkup(
      <InlineText spans={spans} renderInlineObject={renderPicture} />,
    );
    expect(markup).toBe(
      '<span style="white-space:pre-wrap">' +
        '<span style="text-decoration:underline">ab</span>' +
        '<span data-inline-object="" data-code-point="E001" style="display:inline-block;vertical-align:bottom">' +
        '<img alt="Smile" src="smile.png"/>' +
        "</span></span>",
    );
  });

  it("applies the text style to plain runs", () => {
    const spans = buildSpans("hi", { codec, style: { fontSize: 14, color: "red" } });
    const markup = renderToStaticMarkup(
      <InlineText spans={spans} renderInlineObject={renderPicture} className="field" />,
    );
    expect(markup).toBe(
      '<span class="field" style="white-space:pre-wrap">' +
        '<span style="font-size:14px;color:red">hi</span></span>',
    );
  });

  it("leaves unmapped reserved code points as text", () => {
    const spans = buildSpans("\uE002", { codec });
    const markup = renderToStaticMarkup(
      <InlineText spans={spans} renderInlineObject={renderPicture} />,
    );
    expect(markup).toBe('<span style="white-space:pre-wrap"><span>\uE002</span></span>');
  });
});

describe("InlineText: style helpers", () => {
  it("returns undefined for an unstyled run", () => {
    expect(textStyleToCss({})).toBeUndefined();
  });

  it("lets composing override the decoration", () => {
    expect(textStyleToCss({ decoration: "none" }, true)).toEqual({
      textDecoration: "underline",
    });
    expect(textStyleToCss({ decoration: "none" })).toEqual({ textDecoration: "none" });
  });

  it("maps placeholder alignments to vertical-align", () => {
    expect(verticalAlignFor("middle")).toBe("middle");
    expect(verticalAlignFor("aboveBaseline")).toBe("baseline");
    expect(verticalAlignFor("belowBaseline")).toBe("text-top");
  });
});

function ValueView({ controller }: { controller: EditingController }) {
  const value = useEditingValue(controller);
  return <span>{`${value.text}:${value.selection.extentOffset}`}</span>;
}

describe("useEditingValue", () => {
  it("reads the controller's current value", () => {
    const controller = new EditingController({
      value: createEditingValue({ text: "abc", selection: collapsedSelection(3) }),
    });
    expect(renderToStaticMarkup(<ValueView controller={controller} />)).toBe(
      "<span>abc:3</span>",
    );

    controller.setSelection(collapsedSelection(1));
    expect(renderToStaticMarkup(<ValueView controller={controller} />)).toBe(
      "<span>abc:1</span>",
    );
  });
});
