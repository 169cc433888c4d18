/**
 * Anything the registry can deliver a message to
 */
export interface LiveChannel {
  readonly id: string;
  isOpen(): boolean;
  send(text: string): boolean;
  sendJson(value: unknown): boolean;
  close(reason?: string, code?: number): void;
}
