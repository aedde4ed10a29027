/**
 * Watchlist page - the signed-in user's saved titles, read fresh from the
 * database on every visit.
 * GET/POST /app/watchlist
 */

import type { ActionFunctionArgs, LoaderFunctionArgs, MetaFunction } from '@remix-run/node';
import { json } from '@remix-run/node';
import { Form, Link, useActionData, useLoaderData, useNavigation } from '@remix-run/react';
import { ListVideo, Trash2 } from 'lucide-react';
import { Container } from '~/components/layout';
import { MediaGrid, PosterCard } from '~/components/media';
import { Button, Notice, ServiceErrorNotice, Typography, type NoticeData } from '~/components/ui';
import { endSessionOnAuthError, requireUser } from '~/lib/auth/user.server';
import { describeError, toLoadable } from '~/lib/errors';
import { formString } from '~/lib/forms';
import { kindLabel, parseMediaId } from '~/lib/media';
import { getServices } from '~/lib/services.server';

export const meta: MetaFunction = () => {
  return [
    { title: 'Watchlist | CineBase' },
    { name: 'description', content: 'Movies and shows you saved for later' },
  ];
};

interface ActionData {
  notice: NoticeData;
}

export async function loader({ request }: LoaderFunctionArgs) {
  const { user } = await requireUser(request);
  const result = await getServices().database.listEntries(user);
  if (!result.success) {
    await endSessionOnAuthError(request, result.error);
  }
  return json({ watchlist: toLoadable(result) });
}

export async function action({ request }: ActionFunctionArgs) {
  const { user } = await requireUser(request);
  const formData = await request.formData();
  const mediaId = formString(formData, 'mediaId');
  const title = formString(formData, 'title') || 'Title';

  if (formString(formData, 'intent') !== 'remove' || !parseMediaId(mediaId)) {
    return json<ActionData>(
      { notice: { tone: 'error', message: 'Unknown action.' } },
      { status: 400 }
    );
  }

  const result = await getServices().database.removeEntry(user, mediaId);
  if (!result.success) {
    await endSessionOnAuthError(request, result.error);
    return json<ActionData>({ notice: { tone: 'error', message: describeError(result.error) } });
  }
  return json<ActionData>({
    notice: { tone: 'success', message: `Removed "${title}" from your watchlist.` },
  });
}

function EmptyState() {
  return (
    <div className="flex flex-col items-center justify-center py-24 text-center">
      <ListVideo className="mb-4 h-16 w-16 text-foreground-muted" />
      <Typography variant="title" className="mb-2">
        Your watchlist is empty.
      </Typography>
      <Typography variant="caption" as="p" className="mb-6">
        Open a title from the home page and add it to keep track of it here.
      </Typography>
      <Link
        to="/app"
        className="rounded-md bg-accent-primary px-5 py-2.5 font-semibold text-accent-foreground transition-colors hover:bg-accent-hover"
      >
        Browse trending
      </Link>
    </div>
  );
}

export default function WatchlistPage() {
  const { watchlist } = useLoaderData<typeof loader>();
  const actionData = useActionData<typeof action>();
  const navigation = useNavigation();
  const removing = navigation.state === 'submitting' ? navigation.formData?.get('mediaId') : null;

  return (
    <Container size="wide">
      {actionData?.notice && (
        <Notice tone={actionData.notice.tone} message={actionData.notice.message} className="mb-6" />
      )}

      {watchlist.error ? (
        <ServiceErrorNotice error={watchlist.error} retryTo="/app/watchlist" />
      ) : watchlist.data.length === 0 ? (
        <EmptyState />
      ) : (
        <MediaGrid
          title="My Watchlist"
          aside={watchlist.data.length === 1 ? '1 title' : `${watchlist.data.length} titles`}
        >
          {watchlist.data.map((entry) => (
            <PosterCard
              key={entry.mediaId}
              title={entry.title}
              posterUrl={entry.posterUrl}
              subtitle={kindLabel(entry.kind)}
            >
              <Form method="post">
                <input type="hidden" name="mediaId" value={entry.mediaId} />
                <input type="hidden" name="title" value={entry.title} />
                <Button
                  type="submit"
                  name="intent"
                  value="remove"
                  variant="danger"
                  size="sm"
                  disabled={removing === entry.mediaId}
                >
                  <Trash2 className="h-4 w-4" />
                  Remove
                </Button>
              </Form>
            </PosterCard>
          ))}
        </MediaGrid>
      )}
    </Container>
  );
}
