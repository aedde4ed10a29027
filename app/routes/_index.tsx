import type { LoaderFunctionArgs, MetaFunction } from '@remix-run/node';
import { redirect } from '@remix-run/node';
import { getCurrentUser } from '~/lib/auth/user.server';

export const meta: MetaFunction = () => {
  return [
    { title: 'CineBase' },
    { name: 'description', content: 'Trending movies and TV, your watchlist and AI insights' },
  ];
};

export async function loader({ request }: LoaderFunctionArgs) {
  const context = await getCurrentUser(request);
  return redirect(context ? '/app' : '/auth/login');
}
