import { Question, QuestionSet } from 'nest-commander';

export const CONFIRM_DISCONNECT = 'confirm-disconnect';

export interface ConfirmAnswer {
  confirmed: boolean;
}

@QuestionSet({ name: CONFIRM_DISCONNECT })
export class ConfirmDisconnectQuestions {
  @Question({
    type: 'confirm',
    name: 'confirmed',
    message: 'Disconnect the instance? The WhatsApp session will be closed.',
    default: false,
  })
  parseConfirmed(value: boolean): boolean {
    return value;
  }
}
