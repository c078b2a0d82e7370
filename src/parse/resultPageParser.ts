import { load, type CheerioAPI } from "cheerio";
import type { NoticeMarkers } from "../config/types";
import { ExtractionError } from "../core/errors";
import { createEmptyResult, type ExtractedFields, finalizeResult, type InputRecord, type StatusResult } from "../types";
import { countryForToken, DEFAULT_COUNTRY_CODES, type CountryCodeTable } from "./countryCodes";

export const REGISTRATION_TOKEN_PATTERN = /[A-Z]{3}-\d+\/\d+/;
const CYRILLIC_NAME_PATTERN = /[А-Яа-яЁё][А-Яа-яЁё\s]*/;
const LATIN_NAME_PATTERN = /^[A-Z][A-Z\s'-]*$/;

const STATUS_ICONS = ["icon-check", "icon-share", "icon-ok-sign", "icon-arrow-right", "icon-ok"] as const;
const GRAY_HEADER_SPAN = "h3 span.color-gray.text-shadow-white";

const LABELS = {
  educationLevel: "Уровень образования:",
  educationProgram: "Образовательная программа:",
  preparatoryFaculty: "Подготовительный факультет:",
  systemRegistration: "Ваш регистрационный номер в Системе",
} as const;

export interface ResultDocument {
  $: CheerioAPI;
  input: InputRecord;
  header?: string;
  headerToken?: string;
}

/** One way of locating a field; `undefined` hands over to the next one. */
export type FieldExtractor = (doc: ResultDocument) => string | undefined;

export interface ResultPageParserOptions {
  countryCodes?: CountryCodeTable;
  noticeMarkers?: NoticeMarkers;
}

const DEFAULT_NOTICE_MARKERS: NoticeMarkers = {
  educationProgram: "В 2026 году",
  preparatoryFaculty: "В 2025 году",
};

function normalizeBlockText(raw: string): string {
  return raw
    .split("\n")
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter((line) => line.length > 0)
    .join("\n");
}

/** Text of every match, with `<br>` read as a line break. Empty matches are skipped. */
export function textsOf($: CheerioAPI, selector: string): string[] {
  const texts: string[] = [];
  $(selector).each((_, element) => {
    const clone = $(element).clone();
    clone.find("br").replaceWith("\n");
    const text = normalizeBlockText(clone.text());
    if (text) {
      texts.push(text);
    }
  });
  return texts;
}

export function textOf($: CheerioAPI, selector: string): string | undefined {
  return textsOf($, selector)[0];
}

function innermostContaining($: CheerioAPI, marker: string): string | undefined {
  const texts: string[] = [];
  $(`.span8:contains("${marker}")`)
    .filter((_, element) => $(element).find(`.span8:contains("${marker}")`).length === 0)
    .each((_, element) => {
      const clone = $(element).clone();
      clone.find("br").replaceWith("\n");
      const text = normalizeBlockText(clone.text());
      if (text) {
        texts.push(text);
      }
    });
  return texts[0];
}

function joinBlocks(blocks: Array<string | undefined>): string | undefined {
  const unique: string[] = [];
  for (const block of blocks) {
    if (block && !unique.includes(block)) {
      unique.push(block);
    }
  }
  return unique.length > 0 ? unique.join("\n") : undefined;
}

export function firstDefined(extractors: readonly FieldExtractor[], doc: ResultDocument): string | undefined {
  for (const extract of extractors) {
    const value = extract(doc);
    if (value !== undefined && value !== "") {
      return value;
    }
  }
  return undefined;
}

export const cyrillicNameFromHeader: FieldExtractor = ({ header, headerToken }) => {
  if (!header) {
    return undefined;
  }
  const beforeToken = headerToken ? header.slice(0, header.indexOf(headerToken)) : header;
  return CYRILLIC_NAME_PATTERN.exec(beforeToken)?.[0].trim() || undefined;
};

export const latinNameFromSecondGraySpan: FieldExtractor = ({ $ }) => {
  return textsOf($, GRAY_HEADER_SPAN)[1];
};

export const latinNameFromAnyGraySpan: FieldExtractor = ({ $ }) => {
  return textsOf($, GRAY_HEADER_SPAN).find((text) => LATIN_NAME_PATTERN.test(text));
};

export const countryFromHeaderText: FieldExtractor = ({ header, headerToken }) => {
  if (!header || !headerToken) {
    return undefined;
  }
  const afterToken = header.slice(header.indexOf(headerToken) + headerToken.length);
  return /,\s*([^,\n]+)/.exec(afterToken)?.[1].trim() || undefined;
};

export const countryFromGraySpan: FieldExtractor = ({ $ }) => {
  const parts = textOf($, GRAY_HEADER_SPAN)?.split(",") ?? [];
  return parts.length > 1 ? parts[1].trim() || undefined : undefined;
};

export function countryFromCodeTable(table: CountryCodeTable): FieldExtractor {
  return ({ $, headerToken, input }) => {
    const systemToken = systemRegistrationNumber({ $, input });
    const token = headerToken ?? systemToken ?? input.registrationToken;
    return countryForToken(token, table);
  };
}

export const statusLabel: FieldExtractor = ({ $ }) => {
  const selector = STATUS_ICONS.map((icon) => `.span8:has(.${icon})`).join(", ");
  return textOf($, selector);
};

export const statusMessage: FieldExtractor = ({ $ }) => {
  return joinBlocks(textsOf($, ".span8.text-shadow-white p"));
};

export function siblingAfterLabel(label: string): FieldExtractor {
  return ({ $ }) => textOf($, `.span4:contains("${label}") + .span8`);
}

/** Looser form of `siblingAfterLabel` for markup that drops the grid classes. */
export function nextToLeafLabel(label: string): FieldExtractor {
  return ({ $ }) => {
    const labelNode = $("body *")
      .filter((_, element) => $(element).children().length === 0 && $(element).text().includes(label))
      .first();
    if (labelNode.length === 0) {
      return undefined;
    }
    const sibling = labelNode.next();
    const clone = sibling.clone();
    clone.find("br").replaceWith("\n");
    return normalizeBlockText(clone.text()) || undefined;
  };
}

export const systemRegistrationNumber: FieldExtractor = ({ $ }) => {
  const block = innermostContaining($, LABELS.systemRegistration);
  return block ? REGISTRATION_TOKEN_PATTERN.exec(block)?.[0] : undefined;
};

export class ResultPageParser {
  private readonly countryExtractors: readonly FieldExtractor[];
  private readonly noticeMarkers: NoticeMarkers;

  constructor(options: ResultPageParserOptions = {}) {
    this.countryExtractors = [
      countryFromHeaderText,
      countryFromGraySpan,
      countryFromCodeTable(options.countryCodes ?? DEFAULT_COUNTRY_CODES),
    ];
    this.noticeMarkers = options.noticeMarkers ?? DEFAULT_NOTICE_MARKERS;
  }

  /**
   * A page that parses is a processed record: the result is finalized as a
   * success. An error banner throws `ExtractionError` instead.
   */
  parse(html: string, input: InputRecord, now = new Date()): StatusResult {
    const $ = load(html);

    if ($(".alert-error").length > 0) {
      const banner = textOf($, ".alert-error") ?? "";
      throw new ExtractionError(`Error on tracking page: ${banner}`);
    }

    const header = textOf($, "h3");
    const doc: ResultDocument = {
      $,
      input,
      header,
      headerToken: header ? REGISTRATION_TOKEN_PATTERN.exec(header)?.[0] : undefined,
    };

    const fields: ExtractedFields = {
      cyrillicName: cyrillicNameFromHeader(doc),
      latinName: firstDefined([latinNameFromSecondGraySpan, latinNameFromAnyGraySpan], doc),
      resolvedRegistrationNumber: firstDefined([systemRegistrationNumber, (d) => d.headerToken], doc),
      country: firstDefined(this.countryExtractors, doc),
      statusLabel: statusLabel(doc),
      statusMessage: statusMessage(doc),
      educationLevel: firstDefined(
        [siblingAfterLabel(LABELS.educationLevel), nextToLeafLabel(LABELS.educationLevel)],
        doc,
      ),
      educationProgram: joinBlocks([
        firstDefined([siblingAfterLabel(LABELS.educationProgram), nextToLeafLabel(LABELS.educationProgram)], doc),
        innermostContaining($, this.noticeMarkers.educationProgram),
      ]),
      preparatoryFaculty: joinBlocks([
        firstDefined([siblingAfterLabel(LABELS.preparatoryFaculty), nextToLeafLabel(LABELS.preparatoryFaculty)], doc),
        innermostContaining($, this.noticeMarkers.preparatoryFaculty),
      ]),
    };

    const result = createEmptyResult(input, now);
    for (const [key, value] of Object.entries(fields)) {
      if (value !== undefined) {
        Object.assign(result, { [key]: value });
      }
    }
    return finalizeResult(result);
  }
}
