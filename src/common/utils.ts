import logger from "node-color-log"

export { logger }

export const log = (stack?: string) =>
  logger.bgColor("red").color("black").log(stack)
