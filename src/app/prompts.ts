// src/app/prompts.ts
import inquirer from 'inquirer';

export interface Choice<T> {
  name: string;
  value: T;
}

export interface InputOptions {
  default?: string;
  validate?: (input: string) => true | string;
}

/**
 * Everything the interactive UI asks of the terminal
 */
export interface Prompter {
  render(lines: string[]): void;
  select<T>(message: string, choices: Choice<T>[], pageSize?: number): Promise<T>;
  input(message: string, options?: InputOptions): Promise<string>;
  confirm(message: string, defaultValue?: boolean): Promise<boolean>;
}

export class InquirerPrompter implements Prompter {
  render(lines: string[]): void {
    console.clear();
    console.log(lines.join('\n'));
    console.log();
  }

  async select<T>(message: string, choices: Choice<T>[], pageSize: number = 15): Promise<T> {
    const answers = await inquirer.prompt<{ value: T }>([
      {
        type: 'list',
        name: 'value',
        message,
        choices,
        pageSize,
        loop: false,
      },
    ]);
    return answers.value;
  }

  async input(message: string, options: InputOptions = {}): Promise<string> {
    const answers = await inquirer.prompt<{ value: string }>([
      {
        type: 'input',
        name: 'value',
        message,
        default: options.default,
        validate: options.validate,
      },
    ]);
    return answers.value;
  }

  async confirm(message: string, defaultValue: boolean = false): Promise<boolean> {
    const answers = await inquirer.prompt<{ value: boolean }>([
      {
        type: 'confirm',
        name: 'value',
        message,
        default: defaultValue,
      },
    ]);
    return answers.value;
  }
}
