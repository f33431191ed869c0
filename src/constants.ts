export const CLI_NAME = "medic-collect";
