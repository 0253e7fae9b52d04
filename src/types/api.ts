export interface ApiError {
  error: string;
  message: string;
  statusCode: number | null;
  timestamp: string;
  endpoint?: string;
  method?: string;
  params?: Record<string, string>;
}
