// largest delay setTimeout honours; anything longer fires after 1ms
export const MAX_TIMER_DELAY_MS = 2_147_483_647;
