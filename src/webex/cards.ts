// Adaptive Card data model for message attachments.
// Webex renders schema version 1.3 and below: https://developer.webex.com/docs/cards

import type { CardAttachment } from "./types.js";

export const ADAPTIVE_CARD_CONTENT_TYPE = "application/vnd.microsoft.card.adaptive";
export const ADAPTIVE_CARD_SCHEMA = "http://adaptivecards.io/schemas/adaptive-card.json";

export type Spacing = "default" | "none" | "small" | "medium" | "large" | "extraLarge" | "padding";

export type TextSize = "default" | "small" | "medium" | "large" | "extraLarge";
export type TextWeight = "default" | "lighter" | "bolder";
export type TextColor = "default" | "dark" | "light" | "accent" | "good" | "warning" | "attention";
export type HorizontalAlignment = "left" | "center" | "right";

/** Fields every body element may carry. */
export type ElementCommon = {
  id?: string;
  spacing?: Spacing;
  separator?: boolean;
  isVisible?: boolean;
};

export type TextBlock = ElementCommon & {
  type: "TextBlock";
  text: string;
  size?: TextSize;
  weight?: TextWeight;
  color?: TextColor;
  wrap?: boolean;
  isSubtle?: boolean;
  maxLines?: number;
  horizontalAlignment?: HorizontalAlignment;
};

export type Image = ElementCommon & {
  type: "Image";
  url: string;
  altText?: string;
  size?: "auto" | "stretch" | "small" | "medium" | "large";
  style?: "default" | "person";
  selectAction?: CardAction;
};

export type Fact = {
  title: string;
  value: string;
};

export type FactSet = ElementCommon & {
  type: "FactSet";
  facts: Fact[];
};

export type Container = ElementCommon & {
  type: "Container";
  items: CardElement[];
  style?: "default" | "emphasis" | "good" | "attention" | "warning" | "accent";
  selectAction?: CardAction;
};

export type Column = ElementCommon & {
  type: "Column";
  items: CardElement[];
  width?: string | number;
};

export type ColumnSet = ElementCommon & {
  type: "ColumnSet";
  columns: Column[];
};

export type InputText = ElementCommon & {
  type: "Input.Text";
  id: string;
  placeholder?: string;
  value?: string;
  isMultiline?: boolean;
  maxLength?: number;
  label?: string;
  isRequired?: boolean;
};

export type InputToggle = ElementCommon & {
  type: "Input.Toggle";
  id: string;
  title: string;
  value?: string;
  valueOn?: string;
  valueOff?: string;
};

export type Choice = {
  title: string;
  value: string;
};

export type InputChoiceSet = ElementCommon & {
  type: "Input.ChoiceSet";
  id: string;
  choices: Choice[];
  isMultiSelect?: boolean;
  style?: "compact" | "expanded";
  value?: string;
  label?: string;
};

export type ActionSet = ElementCommon & {
  type: "ActionSet";
  actions: CardAction[];
};

export type CardElement =
  | TextBlock
  | Image
  | FactSet
  | Container
  | ColumnSet
  | InputText
  | InputToggle
  | InputChoiceSet
  | ActionSet;

type ActionCommon = {
  id?: string;
  title?: string;
  iconUrl?: string;
  style?: "default" | "positive" | "destructive";
};

export type SubmitAction = ActionCommon & {
  type: "Action.Submit";
  data?: Record<string, unknown>;
};

export type OpenUrlAction = ActionCommon & {
  type: "Action.OpenUrl";
  url: string;
};

export type ShowCardAction = ActionCommon & {
  type: "Action.ShowCard";
  card: AdaptiveCard;
};

export type CardAction = SubmitAction | OpenUrlAction | ShowCardAction;

export type AdaptiveCard = {
  type: "AdaptiveCard";
  version: string;
  $schema: string;
  body?: CardElement[];
  actions?: CardAction[];
  selectAction?: CardAction;
  fallbackText?: string;
  minHeight?: string;
  lang?: string;
};

export function createAdaptiveCard(
  init: Partial<Omit<AdaptiveCard, "type" | "$schema">> = {},
): AdaptiveCard {
  return {
    ...init,
    type: "AdaptiveCard",
    version: init.version ?? "1.3",
    $schema: ADAPTIVE_CARD_SCHEMA,
  };
}

export function addCardBody(card: AdaptiveCard, ...elements: CardElement[]): AdaptiveCard {
  return { ...card, body: [...(card.body ?? []), ...elements] };
}

export function addCardActions(card: AdaptiveCard, ...actions: CardAction[]): AdaptiveCard {
  return { ...card, actions: [...(card.actions ?? []), ...actions] };
}

export function cardAttachment(card: AdaptiveCard): CardAttachment {
  return { contentType: ADAPTIVE_CARD_CONTENT_TYPE, content: card };
}

/** Walks the card body (containers and columns included) and returns input ids in order. */
export function listCardInputIds(card: AdaptiveCard): string[] {
  const ids: string[] = [];
  const visit = (elements: CardElement[]) => {
    for (const element of elements) {
      switch (element.type) {
        case "Input.Text":
        case "Input.Toggle":
        case "Input.ChoiceSet":
          ids.push(element.id);
          break;
        case "Container":
          visit(element.items);
          break;
        case "ColumnSet":
          for (const column of element.columns) visit(column.items);
          break;
        default:
          break;
      }
    }
  };
  visit(card.body ?? []);
  return ids;
}
