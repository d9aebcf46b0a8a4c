import { Question, QuestionSet } from 'nest-commander';
import { DEFAULT_SERVER_URL } from '../../config/evolution.config';

export const INSTALL_QUESTIONS = 'install';

@QuestionSet({ name: INSTALL_QUESTIONS })
export class InstallQuestions {
  @Question({
    type: 'input',
    name: 'serverUrl',
    message: 'Evolution API server URL:',
    default: DEFAULT_SERVER_URL,
  })
  parseServerUrl(value: string): string {
    return value.trim().replace(/\/+$/, '');
  }

  @Question({
    type: 'password',
    name: 'apiKey',
    message: 'Evolution API key:',
    mask: '*',
  })
  parseApiKey(value: string): string {
    return value.trim();
  }

  @Question({
    type: 'input',
    name: 'defaultInstance',
    message: 'Default instance name:',
    default: 'default',
  })
  parseDefaultInstance(value: string): string {
    return value.trim();
  }

  @Question({
    type: 'confirm',
    name: 'runMigrations',
    message: 'Run database migrations now?',
    default: true,
  })
  parseRunMigrations(value: boolean): boolean {
    return value;
  }
}
