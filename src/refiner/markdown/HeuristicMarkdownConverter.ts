import type {
  MarkdownConversionOptions,
  MarkdownConversionResult,
  MarkdownConverter,
} from "../../enrichment/types";
import type { RawContent } from "../../types";
import { mapProseLines } from "../../utils/markdown";

const GLYPH_BULLET = /^([ \t]*)[•●○■□▪▸►→][ \t]*(\S.*)$/;
const PAREN_NUMBER = /^([ \t]*)(\d+)\)[ \t]+(\S.*)$/;
const PAREN_LETTER = /^([ \t]*)[a-z]\)[ \t]+(\S.*)$/;

/**
 * Rule-based conversion of plain extracted text into markdown. Typographic
 * bullets become "-" items and "1)" / "a)" markers become ordered and
 * unordered list items. Never calls a language model.
 */
export class HeuristicMarkdownConverter implements MarkdownConverter {
  async convert(
    raw: RawContent,
    _options: MarkdownConversionOptions,
  ): Promise<MarkdownConversionResult> {
    const markdown = mapProseLines(raw.text, (line) => {
      const glyph = line.match(GLYPH_BULLET);
      if (glyph) return `${glyph[1]}- ${glyph[2]}`;
      const numbered = line.match(PAREN_NUMBER);
      if (numbered) return `${numbered[1]}${numbered[2]}. ${numbered[3]}`;
      const lettered = line.match(PAREN_LETTER);
      if (lettered) return `${lettered[1]}- ${lettered[2]}`;
      return line;
    });

    return { markdown, success: true, usedLlm: false, warnings: [] };
  }
}
