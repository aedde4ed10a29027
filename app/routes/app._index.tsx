/**
 * Home page: trending this week, search results for ?q= and the selected
 * title's details with watchlist and AI insight actions.
 * GET/POST /app
 */

import type { ActionFunctionArgs, LoaderFunctionArgs, MetaFunction } from "@remix-run/node";
import { json } from "@remix-run/node";
import { Form, useActionData, useLoaderData } from "@remix-run/react";
import { Info, Plus } from "lucide-react";
import { Container } from "~/components/layout";
import { DetailPanel, MediaGrid, PosterCard } from "~/components/media";
import { Button, Notice, ServiceErrorNotice, type NoticeData } from "~/components/ui";
import { endSessionOnAuthError, requireUser } from "~/lib/auth/user.server";
import {
  addToWatchlist,
  getDetails,
  getMediaInsight,
  getTrending,
  searchTitles,
} from "~/lib/catalog.server";
import { describeError, ok, toLoadable, type ServiceError } from "~/lib/errors";
import { formString } from "~/lib/forms";
import { formatMetaLine, kindLabel, parseMediaId, releaseYear, toMediaId } from "~/lib/media";
import { getServices } from "~/lib/services.server";
import type { MediaDetails, MediaSummary } from "~/lib/tmdb/types";

const TRENDING_LIMIT = 12;

export const meta: MetaFunction = () => {
  return [
    { title: "Home | CineBase" },
    { name: "description", content: "Trending movies and TV, search and AI insights" },
  ];
};

interface ActionData {
  notice: NoticeData | null;
}

export async function loader({ request }: LoaderFunctionArgs) {
  const { store } = await requireUser(request);
  const { metadata, insight } = getServices();
  const query = (new URL(request.url).searchParams.get("q") ?? "").trim();

  const [trending, search] = await Promise.all([
    getTrending(store, metadata, "week", 1),
    query ? searchTitles(store, metadata, query) : null,
  ]);

  // A selection whose details cannot be loaded is dropped
  let selectedError: ServiceError | null = null;
  let selected: MediaDetails | null = null;
  const selectedId = store.getSelection("selectedMedia");
  if (selectedId) {
    const details = await getDetails(store, metadata, selectedId);
    if (details.success) {
      selected = details.data;
    } else {
      store.clearSelection("selectedMedia");
      selectedError = details.error;
    }
  }

  const lastInsight = store.getSelection("lastAiResult");
  const selectedInsight =
    selected && lastInsight?.subject === toMediaId(selected.kind, selected.id)
      ? lastInsight
      : null;

  return json({
    query,
    trending: toLoadable<MediaSummary[]>(
      trending.success ? ok(trending.data.results.slice(0, TRENDING_LIMIT)) : trending
    ),
    search: search ? toLoadable(search) : null,
    selected,
    selectedError,
    selectedInsight,
    insightsEnabled: insight !== null,
  });
}

export async function action({ request }: ActionFunctionArgs) {
  const { user, store } = await requireUser(request);
  const { metadata, database, insight } = getServices();
  const formData = await request.formData();
  const intent = formString(formData, "intent");
  const mediaId = formString(formData, "mediaId");

  switch (intent) {
    case "select": {
      if (!parseMediaId(mediaId)) {
        return json<ActionData>(
          { notice: { tone: "error", message: "That title could not be opened." } },
          { status: 400 }
        );
      }
      store.setSelection("selectedMedia", mediaId);
      return json<ActionData>({ notice: null });
    }

    case "clear-selection": {
      store.clearSelection("selectedMedia");
      return json<ActionData>({ notice: null });
    }

    case "add-to-watchlist": {
      const details = await getDetails(store, metadata, mediaId);
      if (!details.success) {
        return json<ActionData>({ notice: { tone: "error", message: describeError(details.error) } });
      }
      const result = await addToWatchlist(database, user, details.data);
      if (!result.success) {
        await endSessionOnAuthError(request, result.error);
        return json<ActionData>({ notice: { tone: "error", message: describeError(result.error) } });
      }
      return json<ActionData>({
        notice: { tone: "success", message: `Added "${result.data.title}" to your watchlist.` },
      });
    }

    case "insight": {
      const details = await getDetails(store, metadata, mediaId);
      if (!details.success) {
        return json<ActionData>({ notice: { tone: "error", message: describeError(details.error) } });
      }
      store.setSelection("selectedMedia", mediaId);
      const result = await getMediaInsight(store, insight, details.data);
      if (!result.success) {
        return json<ActionData>({ notice: { tone: "error", message: describeError(result.error) } });
      }
      return json<ActionData>({ notice: null });
    }

    default:
      return json<ActionData>(
        { notice: { tone: "error", message: "Unknown action." } },
        { status: 400 }
      );
  }
}

function summarySubtitle(item: MediaSummary): string {
  return formatMetaLine([releaseYear(item.releaseDate), kindLabel(item.kind)]);
}

function SummaryCard({
  item,
  isSelected,
  showAdd,
}: {
  item: MediaSummary;
  isSelected: boolean;
  showAdd: boolean;
}) {
  return (
    <PosterCard
      title={item.title}
      posterUrl={item.posterUrl}
      subtitle={summarySubtitle(item)}
      rating={item.rating}
      isSelected={isSelected}
    >
      <Form method="post" className="flex flex-wrap gap-2">
        <input type="hidden" name="mediaId" value={toMediaId(item.kind, item.id)} />
        <Button type="submit" name="intent" value="select" variant="secondary" size="sm">
          <Info className="h-4 w-4" />
          Details
        </Button>
        {showAdd && (
          <Button type="submit" name="intent" value="add-to-watchlist" variant="ghost" size="sm" aria-label={`Add ${item.title} to watchlist`}>
            <Plus className="h-4 w-4" />
          </Button>
        )}
      </Form>
    </PosterCard>
  );
}

export default function Home() {
  const {
    query,
    trending,
    search,
    selected,
    selectedError,
    selectedInsight,
    insightsEnabled,
  } = useLoaderData<typeof loader>();
  const actionData = useActionData<typeof action>();
  const selectedId = selected ? toMediaId(selected.kind, selected.id) : null;
  const retryTo = query ? `/app?q=${encodeURIComponent(query)}` : "/app";

  return (
    <Container size="wide">
      {actionData?.notice && (
        <Notice tone={actionData.notice.tone} message={actionData.notice.message} className="mb-6" />
      )}

      {selectedError && (
        <ServiceErrorNotice
          error={selectedError}
          retryTo={retryTo}
          emptyMessage="That title is no longer available."
          className="mb-6"
        />
      )}

      {selected && (
        <DetailPanel details={selected} insight={selectedInsight} insightsEnabled={insightsEnabled} />
      )}

      {search && (
        search.error ? (
          <ServiceErrorNotice error={search.error} retryTo={retryTo} className="mb-10" />
        ) : search.data.results.length === 0 ? (
          <Notice tone="info" message={`No results found for "${query}".`} className="mb-10" />
        ) : (
          <MediaGrid
            title={`Results for "${query}"`}
            aside={`${search.data.totalResults} found`}
          >
            {search.data.results.map((item) => (
              <SummaryCard
                key={toMediaId(item.kind, item.id)}
                item={item}
                isSelected={toMediaId(item.kind, item.id) === selectedId}
                showAdd
              />
            ))}
          </MediaGrid>
        )
      )}

      {trending.error ? (
        <ServiceErrorNotice error={trending.error} retryTo={retryTo} emptyMessage="Nothing is trending right now." />
      ) : (
        <MediaGrid title="Trending This Week">
          {trending.data.map((item) => (
            <SummaryCard
              key={toMediaId(item.kind, item.id)}
              item={item}
              isSelected={toMediaId(item.kind, item.id) === selectedId}
              showAdd={false}
            />
          ))}
        </MediaGrid>
      )}
    </Container>
  );
}
