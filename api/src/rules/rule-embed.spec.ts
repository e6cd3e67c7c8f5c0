import { buildRuleEmbed, channelDisplayName, matchRuleChannel } from './rule-embed';

describe('matchRuleChannel', () => {
  const channels = [
    { id: '1', name: 'server-rules' },
    { id: '2', name: 'community_rules' },
    { id: '3', name: 'rp-rules' },
  ];

  it('matches ignoring case, hyphens and underscores', () => {
    expect(matchRuleChannel(channels, 'Community')?.id).toBe('2');
    expect(matchRuleChannel(channels, 'RP')?.id).toBe('3');
  });

  it('matches when the category contains the channel name', () => {
    expect(matchRuleChannel(channels, 'server-rules-extended')?.id).toBe('1');
  });

  it('falls back to the first channel', () => {
    expect(matchRuleChannel(channels, 'gameplay')?.id).toBe('1');
  });

  it('returns undefined for an empty category', () => {
    expect(matchRuleChannel([], 'general')).toBeUndefined();
  });
});

describe('channelDisplayName', () => {
  it('title-cases the words of a channel name', () => {
    expect(channelDisplayName('server-rules')).toBe('Server Rules');
    expect(channelDisplayName('rp_RULES')).toBe('Rp Rules');
  });
});

describe('buildRuleEmbed', () => {
  it('adds one numbered field per non-blank line', () => {
    const embed = buildRuleEmbed(
      { title: 'Conduct', content: 'Be respectful\n\n  No spam  \n' },
      null,
    ).toJSON();

    expect(embed.title).toBe('📜 Conduct');
    expect(embed.color).toBe(0xd4af37);
    expect(embed.fields).toEqual([
      { name: '📌 Rule 1', value: 'Be respectful' },
      { name: '📌 Rule 2', value: 'No spam' },
    ]);
    expect(embed.author).toEqual({ name: 'Maestros Community Rules' });
    expect(embed.thumbnail).toBeUndefined();
  });

  it('uses the guild icon for author, thumbnail and footer', () => {
    const icon = 'https://cdn.example.com/icon.png';
    const embed = buildRuleEmbed({ title: 'Conduct', content: 'Be kind' }, icon).toJSON();

    expect(embed.author?.icon_url).toBe(icon);
    expect(embed.thumbnail?.url).toBe(icon);
    expect(embed.footer).toEqual({ text: 'Regards from Maestros Community', icon_url: icon });
  });
});
