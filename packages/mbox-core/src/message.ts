import type { MessageView } from '@mailspool/shared';
import type { HeaderMap } from './header-map';
import type { Envelope } from './header-parser';

export interface MessageInit {
  index: number;
  headers: HeaderMap;
  body: readonly string[];
  envelope?: Envelope;
  /** Decoded display lines; defaults to the raw body */
  text?: readonly string[];
  displaySender?: string;
  displaySubject?: string;
}

/**
 * One parsed message. Instances are frozen: headers, body and the derived
 * display fields never change once the message exists.
 */
export class Message {
  readonly index: number;
  readonly headers: HeaderMap;
  readonly body: readonly string[];
  readonly envelope: Envelope;
  readonly text: readonly string[];
  readonly displaySender: string;
  readonly displaySubject: string;

  constructor(init: MessageInit) {
    this.index = init.index;
    this.headers = init.headers;
    this.body = Object.freeze([...init.body]);
    this.envelope = Object.freeze({ ...(init.envelope ?? { sender: '', timestamp: '' }) });
    this.text = init.text ? Object.freeze([...init.text]) : this.body;
    this.displaySender = init.displaySender ?? this.sender;
    this.displaySubject = init.displaySubject ?? this.subject;
    Object.freeze(this);
  }

  get sender(): string {
    return this.headers.get('from') ?? '';
  }

  get subject(): string {
    return this.headers.get('subject') ?? '';
  }

  get date(): string {
    return this.headers.get('date') ?? '';
  }

  toView(): MessageView {
    return {
      index: this.index,
      sender: this.displaySender,
      subject: this.displaySubject,
      date: this.date,
      body: this.text,
    };
  }
}
