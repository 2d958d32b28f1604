export const SERVICE_QUEUES = {
  thumbnail: 'q.thumbnail',
} as const;
