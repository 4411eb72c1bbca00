// Reference agreement text students must copy into their registration file

export const REFERENCE_AGREEMENT = `Я подтверждаю следующее:
1. Я не буду списывать решения у других участников курса.
2. При использовании больших языковых моделей (LLM) или других генеративных ИИ-инструментов
   для выполнения домашних заданий я обязуюсь полностью понимать присланный код и быть
   готовым пояснить, как он работает, почему используется та или иная конструкция,
   а также внести в него изменения по запросу преподавателя.

Нарушение этих правил может повлечь за собой исключение из курса или
аннулирование результатов.
`;

/**
 * Normalize text for comparison: outer whitespace and trailing whitespace
 * on each line are ignored, line endings are unified.
 */
export function normalizeAgreement(text: string): string {
  return text
    .trim()
    .split(/\r\n|\r|\n/)
    .map(line => line.trimEnd())
    .join('\n');
}

export function agreementMatches(candidate: string, reference: string = REFERENCE_AGREEMENT): boolean {
  return normalizeAgreement(candidate) === normalizeAgreement(reference);
}
