import path from 'path';
import { subjectPrompt } from '../copy';
import { TransportError } from '../errors';
import { logger } from '../observability/logger';
import { CallbackEvent, ChatTransport, InlineButton, InlineKeyboard, MessageRef } from '../transport/types';
import { packMenuCallback, parseMenuCallback } from './menu-callback';
import { MESSAGE_TEXT_LIMIT, MenuTree, SubmenuNode, childPathOf, findMenuNode } from './menu-tree';

/** Receives the category chosen through a subject button */
export interface SubjectSink {
  beginSubject(conversationId: number, subject: string, prompt: string): Promise<void>;
}

export interface MenuHandlerDeps {
  transport: ChatTransport;
  tree: MenuTree;
  filesDir: string;
  /** Replaces the root menu text when set */
  helloMessage?: string;
}

export function buildMenuKeyboard(menu: SubmenuNode, messageId: number): InlineKeyboard {
  const childPath = childPathOf(menu);
  const buttons: InlineButton[] = menu.children.map((child) =>
    child.kind === 'link'
      ? { text: child.label, url: child.url }
      : { text: child.label, callbackData: packMenuCallback({ path: childPath, code: child.code, messageId }) },
  );
  const rows = menu.layout === 'row' ? [buttons] : buttons.map((button) => [button]);

  if (childPath) {
    const nav: InlineButton[] = [{ text: '🏠', callbackData: packMenuCallback({ path: '', code: '', messageId }) }];
    const segments = childPath.split('.');
    if (segments.length > 1) {
      nav.push({
        text: '←',
        callbackData: packMenuCallback({
          path: segments.slice(0, -2).join('.'),
          code: segments[segments.length - 2],
          messageId,
        }),
      });
    }
    rows.push(nav);
  }
  return { kind: 'inline', rows };
}

/**
 * FAQ menu navigation over inline buttons. Submenus are edited in place,
 * falling back to a new message when the original can no longer be edited.
 */
export class MenuHandler {
  constructor(private readonly deps: MenuHandlerDeps) {}

  private menuText(menu: SubmenuNode): string {
    if (!menu.code && this.deps.helloMessage) return this.deps.helloMessage.slice(0, MESSAGE_TEXT_LIMIT);
    return menu.answer;
  }

  async showRoot(chatId: number): Promise<MessageRef> {
    return this.sendMenu(chatId, this.deps.tree.root);
  }

  async handleCallback(callback: CallbackEvent, subjects: SubjectSink): Promise<void> {
    const parsed = parseMenuCallback(callback.data);
    const chatId = callback.message?.chatId ?? callback.from.id;

    if (parsed) {
      const node = findMenuNode(this.deps.tree, parsed.path, parsed.code);
      switch (node?.kind) {
        case 'menu':
          await this.editOrSendMenu(chatId, parsed.messageId, node);
          break;
        case 'answer':
          await this.deps.transport.sendText(chatId, node.answer);
          break;
        case 'file':
          await this.deps.transport.sendDocument(chatId, path.join(this.deps.filesDir, node.file), {
            caption: node.caption || undefined,
          });
          break;
        case 'subject':
          await subjects.beginSubject(chatId, node.subject, node.answer || subjectPrompt(node.label));
          break;
        case 'link':
          break;
        case undefined:
          logger.warn({ data: callback.data }, 'Menu button no longer exists');
          break;
      }
    } else {
      logger.warn({ data: callback.data }, 'Unrecognized menu callback');
    }

    await this.deps.transport.answerCallback(callback.id);
  }

  private async editOrSendMenu(chatId: number, messageId: number, menu: SubmenuNode): Promise<void> {
    try {
      await this.deps.transport.editText({ chatId, messageId }, this.menuText(menu), {
        keyboard: buildMenuKeyboard(menu, messageId),
      });
    } catch (err) {
      if (!(err instanceof TransportError) || err.kind !== 'bad_request') throw err;
      await this.sendMenu(chatId, menu);
    }
  }

  /** Send the text first so the keyboard can carry the new message's id */
  private async sendMenu(chatId: number, menu: SubmenuNode): Promise<MessageRef> {
    const text = this.menuText(menu);
    const sent = await this.deps.transport.sendText(chatId, text, { disablePreview: true });
    await this.deps.transport.editText(sent, text, { keyboard: buildMenuKeyboard(menu, sent.messageId) });
    return sent;
  }
}
