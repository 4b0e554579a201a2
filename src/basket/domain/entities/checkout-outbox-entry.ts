/**
 * 체크아웃 outbox 항목
 * payload 는 직렬화된 체크아웃 이벤트(UTF-8 JSON) 그대로 보관한다.
 */
export interface CheckoutOutboxEntry {
  eventId: string;
  userName: string;
  payload: string;
}
