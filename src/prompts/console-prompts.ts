export interface ConsolePrompts {
  password(message: string): Promise<string>;
  confirm(message: string): Promise<boolean>;
  selection(message: string): Promise<string>;
}

export const inquirerPrompts: ConsolePrompts = {
  async password(message) {
    const inquirer = await import('inquirer');
    // no mask: nothing is echoed while typing
    const { secret } = await inquirer.default.prompt<{ secret: string }>([
      { type: 'password', name: 'secret', message },
    ]);
    return secret;
  },

  async confirm(message) {
    const inquirer = await import('inquirer');
    const { confirmed } = await inquirer.default.prompt<{ confirmed: boolean }>([
      { type: 'confirm', name: 'confirmed', message, default: false },
    ]);
    return confirmed;
  },

  async selection(message) {
    const inquirer = await import('inquirer');
    const { choice } = await inquirer.default.prompt<{ choice: string }>([
      { type: 'input', name: 'choice', message },
    ]);
    return choice.trim();
  },
};
