export {
  InlineText,
  textStyleToCss,
  verticalAlignFor,
  type InlineObjectRenderer,
  type InlineTextProps,
} from "./InlineText";
export { useEditingValue } from "./useEditingValue";
