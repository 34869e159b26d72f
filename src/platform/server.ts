const SERVER_COMMANDS = [
  "npm run dev",
  "npm start",
  "npm run start",
  "npm run watch",
  "yarn dev",
  "yarn start",
  "pnpm dev",
  "pnpm start",
  "pnpm run dev",
  "bun dev",
  "bun run dev",
  "next dev",
  "npx vite",
  "python manage.py runserver",
  "flask run",
  "uvicorn",
  "nodemon",
];

/** Dev servers and watchers: commands that keep running until interrupted. */
export function isServerCommand(command: string): boolean {
  const lower = command.toLowerCase().replace(/\s+/g, " ");
  if (SERVER_COMMANDS.some((s) => lower.includes(s))) return true;
  return /(^|\s)(--watch|-w)(\s|$)/.test(lower) && /\b(tsc|vitest|jest|webpack|tsx|node)\b/.test(lower);
}
