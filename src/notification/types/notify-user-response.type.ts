export type NotifyUserResponse = {
  success_count?: number;
  failure_count?: number;
  message?: string;
};
