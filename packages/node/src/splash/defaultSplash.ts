/** Sample art shown when no splash file is given. */
export const DEFAULT_SPLASH: readonly string[] = Object.freeze([
  "  ____        _           _     ",
  " / ___| _ __ | | __ _ ___| |__  ",
  " \\___ \\| '_ \\| |/ _` / __| '_ \\ ",
  "  ___) | |_) | | (_| \\__ \\ | | |",
  " |____/| .__/|_|\\__,_|___/_| |_|",
  "       |_|                      ",
]);
