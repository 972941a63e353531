export interface SetlistSong {
  readonly title: string;
  readonly performingArtist: string;
  /** Present only when the song is a cover */
  readonly originalArtist?: string;
  /** 1-based position in setlist order */
  readonly position: number;
}

export interface Setlist {
  readonly sourceUrl: string;
  readonly setlistId: string;
  readonly artistName: string;
  readonly venueName: string;
  readonly cityName: string;
  /** Absent when setlist.fm gives no parseable date */
  readonly eventDate?: Date;
  readonly songs: readonly SetlistSong[];
}

// Subset of the setlist.fm REST API setlist payload that we read
export interface SetlistFmSong {
  name?: string;
  info?: string;
  tape?: boolean;
  cover?: {
    mbid?: string;
    name?: string;
  };
}

export interface SetlistFmSet {
  name?: string;
  encore?: number;
  song?: SetlistFmSong[];
}

export interface SetlistFmSetlist {
  id?: string;
  eventDate?: string;
  artist?: {
    mbid?: string;
    name?: string;
  };
  venue?: {
    name?: string;
    city?: {
      name?: string;
      state?: string;
      stateCode?: string;
      country?: {
        code?: string;
        name?: string;
      };
    };
  };
  sets?: {
    set?: SetlistFmSet[];
  };
  url?: string;
}
