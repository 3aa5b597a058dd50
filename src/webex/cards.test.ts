import { describe, expect, it } from "vitest";

import {
  ADAPTIVE_CARD_CONTENT_TYPE,
  ADAPTIVE_CARD_SCHEMA,
  addCardActions,
  addCardBody,
  cardAttachment,
  createAdaptiveCard,
  listCardInputIds,
} from "./cards.js";

describe("adaptive cards", () => {
  it("creates an empty 1.3 card", () => {
    expect(createAdaptiveCard()).toEqual({
      type: "AdaptiveCard",
      version: "1.3",
      $schema: ADAPTIVE_CARD_SCHEMA,
    });
  });

  it("keeps an explicit version", () => {
    expect(createAdaptiveCard({ version: "1.2" }).version).toBe("1.2");
  });

  it("appends body elements and actions without mutating the input", () => {
    const base = createAdaptiveCard();
    const withBody = addCardBody(
      base,
      { type: "TextBlock", text: "Pick a size", weight: "bolder", separator: true },
      { type: "Input.ChoiceSet", id: "size", choices: [{ title: "Large", value: "l" }] },
    );
    const full = addCardActions(withBody, {
      type: "Action.Submit",
      title: "Order",
      data: { action: "order" },
    });

    expect(base.body).toBeUndefined();
    expect(full.body).toHaveLength(2);
    expect(full.actions).toEqual([
      { type: "Action.Submit", title: "Order", data: { action: "order" } },
    ]);
  });

  it("wraps a card as a message attachment", () => {
    const card = createAdaptiveCard({ body: [{ type: "TextBlock", text: "hi" }] });
    expect(cardAttachment(card)).toEqual({
      contentType: ADAPTIVE_CARD_CONTENT_TYPE,
      content: card,
    });
  });

  it("lists input ids through containers and columns", () => {
    const card = createAdaptiveCard({
      body: [
        { type: "Input.Text", id: "name" },
        {
          type: "Container",
          items: [{ type: "Input.Toggle", id: "agree", title: "I agree" }],
        },
        {
          type: "ColumnSet",
          columns: [
            { type: "Column", items: [{ type: "TextBlock", text: "Size" }] },
            {
              type: "Column",
              items: [{ type: "Input.ChoiceSet", id: "size", choices: [] }],
            },
          ],
        },
      ],
    });

    expect(listCardInputIds(card)).toEqual(["name", "agree", "size"]);
  });
});
