import inquirer from 'inquirer';

export interface Prompter {
  confirm(message: string, defaultValue?: boolean): Promise<boolean>;
  input(message: string, defaultValue?: string): Promise<string>;
  select(message: string, choices: string[], defaultValue?: string): Promise<string>;
  /**
   * Ask a yes/no question that is abandoned when `deadline` settles first.
   * Resolves `undefined` in that case.
   */
  confirmUntil(message: string, deadline: Promise<unknown>, defaultValue?: boolean): Promise<boolean | undefined>;
}

export const inquirerPrompter: Prompter = {
  async confirm(message, defaultValue = false) {
    const { answer } = await inquirer.prompt<{ answer: boolean }>([
      { type: 'confirm', name: 'answer', message, default: defaultValue },
    ]);
    return answer;
  },

  async input(message, defaultValue) {
    const { answer } = await inquirer.prompt<{ answer: string }>([
      { type: 'input', name: 'answer', message, default: defaultValue },
    ]);
    return answer;
  },

  async select(message, choices, defaultValue) {
    const { answer } = await inquirer.prompt<{ answer: string }>([
      { type: 'list', name: 'answer', message, choices, default: defaultValue, pageSize: 15 },
    ]);
    return answer;
  },

  async confirmUntil(message, deadline, defaultValue = false) {
    const question = inquirer.prompt<{ answer: boolean }>([
      { type: 'confirm', name: 'answer', message, default: defaultValue },
    ]);
    let answered = false;
    try {
      return await Promise.race([
        question.then(({ answer }) => {
          answered = true;
          return answer;
        }),
        deadline.then(() => undefined),
      ]);
    } finally {
      if (!answered) question.ui.close();
    }
  },
};
