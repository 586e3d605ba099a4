import { CheerioAPI, load } from "cheerio";
import { textOf } from "../lib/html";
import { AsyncStrategy, firstMatchAsync } from "../lib/strategy";
import { RawFaq } from "../types";
import { ExtractionContext } from "./context";

export const FAQ_PATHS = ["/pages/faq", "/pages/faqs", "/faq", "/faqs"] as const;

type FaqStrategy = ($: CheerioAPI) => RawFaq[];

// Accordion-style containers: `.faq` / `.faq-item` with a heading and a body.
const fromFaqContainers: FaqStrategy = ($) => {
  const faqs: RawFaq[] = [];
  $(".faq, .faq-item").each((_, item) => {
    const question = $(item).find("h2, h3, h4, strong").first();
    const answer = $(item).find("p, div").first();
    if (question.length === 0 || answer.length === 0) {
      return;
    }
    faqs.push({ question: textOf(question), answer: textOf(answer) });
  });
  return faqs;
};

// Native disclosure widgets: the summary is the question, the rest is the answer.
const fromDetailsSummary: FaqStrategy = ($) => {
  const faqs: RawFaq[] = [];
  $("details").each((_, details) => {
    const summary = $(details).find("summary").first();
    if (summary.length === 0) {
      return;
    }
    const question = textOf(summary);
    const answer = textOf($(details)).replace(question, "").trim();
    faqs.push({ question, answer });
  });
  return faqs;
};

const fromHeadingParagraphPairs: FaqStrategy = ($) => {
  const faqs: RawFaq[] = [];
  $("h2, h3").each((_, heading) => {
    const paragraph = $(heading).next("p");
    if (paragraph.length === 0) {
      return;
    }
    faqs.push({ question: textOf($(heading)), answer: textOf(paragraph) });
  });
  return faqs;
};

const PAGE_STRATEGIES: readonly FaqStrategy[] = [fromFaqContainers, fromDetailsSummary, fromHeadingParagraphPairs];

/** All FAQs a single page yields; strategies are combined, not alternatives. */
export function parseFaqPage(html: string): RawFaq[] {
  const $ = load(html);
  return PAGE_STRATEGIES.flatMap((strategy) => strategy($));
}

function faqPathStrategy(path: string): AsyncStrategy<ExtractionContext, RawFaq[]> {
  return async (ctx) => {
    const html = await ctx.fetchText(path);
    if (html === null) {
      return null;
    }

    try {
      const faqs = parseFaqPage(html);
      return faqs.length > 0 ? faqs : null;
    } catch (error) {
      ctx.logger.error("faq_parse_failed", { url: ctx.url(path), error });
      return null;
    }
  };
}

/**
 * The first candidate page that yields at least one FAQ wins; the remaining
 * candidates are not requested.
 */
export async function fetchFaqs(ctx: ExtractionContext): Promise<RawFaq[]> {
  const faqs = await firstMatchAsync(FAQ_PATHS.map(faqPathStrategy), ctx);
  ctx.logger.debug("faqs_collected", { count: faqs?.length ?? 0 });
  return faqs ?? [];
}
