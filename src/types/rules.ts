export interface UseType {
  code: string;
  label: string;
  category: string | null;
}
