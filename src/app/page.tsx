import { redirect } from 'next/navigation';
import { readerConfig } from '@/lib/reader/config';

export default function HomePage() {
  redirect(readerConfig.basePath);
}
