// User- and staff-facing message texts.

export const CATEGORY_LABELS = {
  orderProblem: 'Проблема с заказом',
  deliveryProblem: 'Проблема с доставкой',
  other: 'Другое',
  faq: 'Вопросы и ответы',
  back: 'Назад к категориям',
} as const;

/** Button label → stored ticket category, for categories that need order context */
export const ORDER_CATEGORIES: Readonly<Record<string, string>> = {
  [CATEGORY_LABELS.orderProblem]: 'проблемы с заказом',
  [CATEGORY_LABELS.deliveryProblem]: 'задержки доставки',
};

export const OTHER_CATEGORY = 'Другое';
export const NO_TEXT_DESCRIPTION = 'Без текста';

export const USER_COPY = {
  greeting: 'Здравствуйте, это служба заботы о клиентах. Чтобы мы быстрее помогли, выберите тему обращения.',
  askPhone: 'Поделитесь номером телефона, чтобы начать работу со службой заботы.',
  sharePhoneButton: 'Поделиться номером телефона 📲',
  foreignContact:
    "Пожалуйста, поделитесь своим номером (нажмите кнопку и выберите 'Поделиться номером телефона').",
  invalidPhone: 'Неверный формат номера телефона. Попробуйте снова.',
  describeProblem: 'Опишите подробно проблему - мы разберемся и поможем как можно скорее',
  chooseCategory: 'Выберите категорию обращения или FAQ:',
  unknownCommand: 'Неизвестная команда. Выберите из меню.',
  orderNotRecognized: 'Не удалось определить номер заказа. Попробуйте еще раз.',
  noRecentOrders: 'Нет недавних заказов',
  startHint: 'Чтобы создать новое обращение, пожалуйста, нажмите /start и следуйте инструкциям.',
  ticketWithoutThread:
    'Ваше обращение найдено, но оно не связано с темой чата. Пожалуйста, создайте новое обращение через /start.',
  ticketCreateFailed: 'Не удалось создать обращение. Пожалуйста, отправьте описание еще раз чуть позже.',
  forwardBadRequest: 'Не удалось отправить сообщение в тему поддержки. Пожалуйста, создайте новое обращение через /start.',
  forwardForbidden: 'Бот не может переслать ваше сообщение. Попробуйте позже.',
  forwardFailed: 'Произошла ошибка при пересылке сообщения. Попробуйте позже.',
  temporaryError: 'Временная ошибка в системе. Попробуйте позже.',
  closurePrompt: 'Подскажите, пожалуйста, удалось ли решить Ваш вопрос?',
  closureYesButton: 'Да, закрыт',
  closureNoButton: 'Нет, не закрыт',
} as const;

export function guestCategoryPrompt(category: string): string {
  return (
    `Вы выбрали ${category}, но поскольку вы не связаны с аккаунтом магазина, у нас нет ваших заказов. ` +
    'Опишите подробно проблему - мы разберемся и поможем как можно скорее'
  );
}

export function chooseOrderPrompt(category: string, hasOrders: boolean): string {
  const text = `Выберите номер заказа, по которому нужна помощь\nВыбрана категория: ${category}`;
  return hasOrders ? text : `${text}\n${USER_COPY.noRecentOrders}`;
}

export function subjectPrompt(label: string): string {
  return `Пожалуйста, опишите ваш вопрос по теме «${label}»`;
}

const AFTER_ACK =
  '\n\nВы можете продолжить писать сообщения - они будут переданы оператору. ' +
  'Когда обращение будет закрыто, вас попросят оценить качество обслуживания.';

export function ticketAcknowledgement(ticketId: number, staffed: boolean): string {
  const head = staffed
    ? `Мы получили Ваше обращение №${ticketId}, спасибо! Наш оператор уже видит запрос и скоро с Вами свяжется. ` +
      'Пожалуйста, ожидайте ответа - обычно это займет немного времени.'
    : `Мы получили Ваше обращение №${ticketId}, спасибо! График работы техподдержки: с 08:00 до 23:00. ` +
      'Пожалуйста, ожидайте ответа - мы ответим в рабочее время.';
  return head + AFTER_ACK;
}

export function keptOpenMessage(ticketId: number, staffed: boolean): string {
  return staffed
    ? `Мы оставим обращение №${ticketId} открытым. Пожалуйста, уточните, что именно осталось не решенным - ` +
        'оператор скоро с Вами свяжется.'
    : `Мы оставим обращение №${ticketId} открытым. График работы техподдержки: с 08:00 до 23:00. ` +
        'Пожалуйста, уточните, что именно осталось не решенным - мы ответим в рабочее время.';
}

export function resolvedRatingPrompt(ticketId: number): string {
  return (
    `Мы рады, что вопрос решен. Обращение №${ticketId} закрыто. Спасибо, что обратились!\n` +
    'Пожалуйста, оцените качество обслуживания:'
  );
}

export function ratingThanks(ticketId: number): string {
  return (
    `Спасибо за оценку! Обращение №${ticketId} закрыто.\n` + 'Чтобы начать новое обращение, нажмите /start.'
  );
}

export const CALLBACK_ANSWERS = {
  badFormat: 'Неверный формат данных',
  ticketNotFound: 'Тикет не найден',
  alreadyAnswered: 'Ответ уже получен',
  anotherTicketOpen: 'У вас уже есть открытое обращение',
  ratingAlreadySaved: 'Оценка уже сохранена',
  closed: 'Обращение закрыто!',
  keptOpen: 'Обращение осталось открытым',
  rated: 'Спасибо за оценку!',
} as const;

// ───── Staff group ─────

export const STAFF_COPY = {
  closeOutsideThread: 'Команда /close должна использоваться внутри темы тикета.',
  ticketNotFoundForThread: 'Тикет не найден для этой темы',
  threadWithoutTicket: 'В этой теме нет связанного обращения, сообщение не доставлено.',
} as const;

export function alreadyClosedNotice(ticketId: number): string {
  return `Тикет №${ticketId} уже закрыт`;
}

export function closedNotice(ticketId: number): string {
  return `Тикет №${ticketId} закрыт. Запрос решен ли вопрос отправлен пользователю.`;
}

export function surveyNotDelivered(conversationId: number): string {
  return `Не удалось отправить запрос оценки пользователю ${conversationId}`;
}

export function botTargetNotice(conversationId: number): string {
  return `Невозможно отправить сообщение боту ${conversationId}. Боты не могут общаться друг с другом.`;
}

export function userBlockedNotice(conversationId: number, botUsername: string): string {
  return (
    `Ответ не удалось отправить пользователю ${conversationId} (вероятно, заблокировал бота).\n` +
    `Попросите разблокировать @${botUsername} в настройках Telegram.`
  );
}

export function reopenedByMessageNotice(ticketId: number): string {
  return `🔄 Тикет №${ticketId} переоткрыт: пользователь написал новое сообщение.`;
}

export function confirmedClosedNotice(ticketId: number): string {
  return `✅ Тикет №${ticketId} закрыт с подтверждением пользователя. Тема форума закрыта.`;
}

export function reopenedBySurveyNotice(ticketId: number): string {
  return `🔄 Тикет №${ticketId} ПЕРЕОТКРЫТ: пользователь указал, что вопрос не решен. Ожидается уточнение.`;
}

export function ratingNotice(ticketId: number, rating: number): string {
  return `⭐ Пользователь оценил обращение №${ticketId}: ${rating} из 5`;
}

export function missingTopicRightsNotice(userInfo: string): string {
  return (
    `New user <b>${userInfo}</b> writes to the bot, but the bot has not enough rights to create a topic.\n\n` +
    '❗ Make the bot admin, and give it a "Manage topics" permission.'
  );
}

export function userBlockedBotNotice(conversationId: number, name: string): string {
  return `The user banned the bot. User ID: ${conversationId}, Name: ${name}`;
}

export function groupHello(groupId: number, isForum: boolean): string {
  const text = `Hello!\nID of this group: <code>${groupId}</code>`;
  return isForum ? text : `${text}\n\n⚠️ Please enable topics in the group settings. This will also change its ID.`;
}
