import figlet from "figlet";
import { logger } from "./logger";

/**
 * Render `msg` as an ASCII banner, or return it unchanged if figlet fails
 */
export const getAsciiArt = (msg: string): string => {
  try {
    return figlet.textSync(msg, {
      font: "Standard",
      horizontalLayout: "default",
      verticalLayout: "default",
      width: 80,
      whitespaceBreak: true,
    });
  } catch (error) {
    logger.warn("Warning: Banner rendering failed:", error);
    return msg;
  }
};
