import { ObjectType } from "./field-types";

export interface ScreenDefinition {
  key: string;
  name: string;
  objectType: ObjectType;
  supportsRequired: boolean;
  isDisplayOnly: boolean;
}

function screen(
  key: string,
  name: string,
  objectType: ObjectType,
  kind: "input" | "display"
): ScreenDefinition {
  return {
    key,
    name,
    objectType,
    supportsRequired: kind === "input",
    isDisplayOnly: kind === "display",
  };
}

/**
 * Screens that can show dynamic fields. Display-only screens can only
 * toggle a field's presence.
 */
export const SCREEN_DEFINITIONS: ReadonlyArray<ScreenDefinition> = [
  screen("AgentTicketPhone", "New Phone Ticket", ObjectType.TICKET, "input"),
  screen("AgentTicketEmail", "New Email Ticket", ObjectType.TICKET, "input"),
  screen("AgentTicketZoom", "Ticket Zoom", ObjectType.TICKET, "display"),
  screen("AgentTicketClose", "Close Ticket", ObjectType.TICKET, "input"),
  screen("AgentTicketNote", "Add Note", ObjectType.TICKET, "input"),
  screen("AgentTicketMove", "Move Ticket", ObjectType.TICKET, "input"),
  screen("AgentTicketOwner", "Change Owner", ObjectType.TICKET, "input"),
  screen("AgentTicketPriority", "Change Priority", ObjectType.TICKET, "input"),
  screen("CustomerTicketMessage", "Customer New Ticket", ObjectType.TICKET, "input"),
  screen("CustomerTicketZoom", "Customer Ticket View", ObjectType.TICKET, "display"),
  screen("AgentArticleZoom", "Article View", ObjectType.ARTICLE, "display"),
  screen("AgentArticleNote", "Agent Note Article", ObjectType.ARTICLE, "input"),
  screen("AgentArticleClose", "Close Note Article", ObjectType.ARTICLE, "input"),
  screen("AgentArticleReply", "Agent Reply Article", ObjectType.ARTICLE, "input"),
  screen("CustomerArticleReply", "Customer Reply Article", ObjectType.ARTICLE, "input"),
];

export function getScreenDefinition(key: string): ScreenDefinition | undefined {
  return SCREEN_DEFINITIONS.find((definition) => definition.key === key);
}

export function getScreensForObjectType(objectType: ObjectType): ScreenDefinition[] {
  return SCREEN_DEFINITIONS.filter((definition) => definition.objectType === objectType);
}
