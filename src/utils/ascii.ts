import figlet from "figlet";
import { logger } from "./logger.js";

const FIGLET_OPTIONS = {
  horizontalLayout: "default",
  verticalLayout: "default",
  width: 80,
  whitespaceBreak: true,
} as const;

/**
 * Render `msg` as ASCII art in the Standard font, or return it unchanged if
 * figlet cannot render it.
 */
export const getAsciiArt = (msg: string): string => {
  try {
    return figlet.textSync(msg, { font: "Standard", ...FIGLET_OPTIONS });
  } catch (error) {
    logger.warn("Warning: Font rendering failed, printing plain title", error);
    return msg;
  }
};
