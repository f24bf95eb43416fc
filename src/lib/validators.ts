export function isValidBookingId(id: string | undefined | null): id is string {
  return typeof id === 'string' && id.trim().length > 0;
}

export function isSubmittableMessage(text: string | undefined | null): text is string {
  return typeof text === 'string' && text.trim().length > 0;
}
